export const TORTILLA = [
  "Tortilla de patatas",
  "Porciones: 4",
  "Ingredientes:",
  "- 4 huevos",
  "- 500 g de patatas",
  "- Sal",
  "Preparación:",
  "1. Pelar y cortar las patatas",
  "en rodajas finas.",
  "2. Freír las patatas.",
  "3. Batir los huevos y mezclar.",
  "Notas:",
  "Mejor con cebolla.",
].join("\n");

export const PAN_TOSTADO = ["Pan tostado", "Pasos", "Tostar el pan."].join("\n");

/**
 * Single blank page with a correct cross-reference table. A comment line pads
 * the file past 4 KiB; pdf-parse cannot read smaller files (see readPdf).
 */
export function blankPdf(): Buffer {
  const objects = [
    "<< /Type /Catalog /Pages 2 0 R >>",
    "<< /Type /Pages /Kids [3 0 R] /Count 1 >>",
    "<< /Type /Page /Parent 2 0 R /MediaBox [0 0 200 200] >>",
  ];

  let body = `%PDF-1.4\n%${"-".repeat(4096)}\n`;
  const offsets: number[] = [];
  objects.forEach((object, index) => {
    offsets.push(body.length);
    body += `${index + 1} 0 obj\n${object}\nendobj\n`;
  });

  const xrefOffset = body.length;
  body += `xref\n0 ${objects.length + 1}\n0000000000 65535 f \n`;
  for (const offset of offsets) {
    body += `${String(offset).padStart(10, "0")} 00000 n \n`;
  }
  body += `trailer\n<< /Size ${objects.length + 1} /Root 1 0 R >>\nstartxref\n${xrefOffset}\n%%EOF\n`;

  return Buffer.from(body, "latin1");
}

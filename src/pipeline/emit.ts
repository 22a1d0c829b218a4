import { promises as fs } from "fs";
import path from "path";
import { renderMarkdown } from "./markdown";
import { removeAccents } from "./normalize";
import { Recipe } from "./types";

export type IndexEntry = { title: string; slug: string; path: string; markdown?: string };

export type EmitOptions = {
  /** Write `recipes/<slug>.md` next to each JSON file. */
  markdown?: boolean;
};

export function slugify(value: string): string {
  return (
    removeAccents(value)
      .toLowerCase()
      .replace(/[^a-z0-9]+/g, "-")
      .replace(/(^-|-$)+/g, "")
      .slice(0, 80) || "recipe"
  );
}

export async function emit(
  recipes: Recipe[],
  outDir: string,
  options: EmitOptions = {},
): Promise<IndexEntry[]> {
  const recipesDir = path.join(outDir, "recipes");

  await fs.mkdir(recipesDir, { recursive: true });

  const slugCounts = new Map<string, number>();
  const indexPayload: IndexEntry[] = [];

  for (const recipe of recipes) {
    const baseSlug = slugify(recipe.title);
    const nextCount = (slugCounts.get(baseSlug) ?? 0) + 1;
    slugCounts.set(baseSlug, nextCount);
    const resolvedSlug = nextCount === 1 ? baseSlug : `${baseSlug}-${nextCount}`;
    const fileName = `${resolvedSlug}.recipe.json`;

    const entry: IndexEntry = {
      title: recipe.title,
      slug: resolvedSlug,
      path: `recipes/${fileName}`,
    };

    await fs.writeFile(path.join(recipesDir, fileName), JSON.stringify(recipe, null, 2), "utf-8");

    if (options.markdown) {
      const markdownName = `${resolvedSlug}.md`;
      await fs.writeFile(path.join(recipesDir, markdownName), renderMarkdown(recipe), "utf-8");
      entry.markdown = `recipes/${markdownName}`;
    }
    indexPayload.push(entry);
  }

  await fs.writeFile(
    path.join(outDir, "index.json"),
    JSON.stringify(indexPayload, null, 2),
    "utf-8",
  );

  return indexPayload;
}

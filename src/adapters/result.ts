import { Logger, silentLogger } from "../lib/logger";
import { AdapterOutput, SourceKind } from "../pipeline/types";

export type ReadOptions = {
  logger?: Logger;
};

/** Empty extraction result that records why nothing was read. */
export function degraded(
  kind: SourceKind,
  sourcePath: string,
  reason: string,
  error?: unknown,
  logger: Logger = silentLogger,
): AdapterOutput {
  const failure =
    error === undefined ? reason : `${reason}: ${error instanceof Error ? error.message : String(error)}`;
  logger.warn(`Could not extract text from ${sourcePath} (${failure})`);
  return {
    kind,
    text: "",
    meta: {
      sourcePath,
      failure,
    },
  };
}

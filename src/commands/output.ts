import { CliAppError } from "../core/index.js";

export type FileWriter = (path: string, content: Uint8Array) => Promise<void>;
export type OutputPathResolver = (path: string, fileName: string) => Promise<string>;

/** Writes subtitle text as UTF-8 and returns the byte count. */
export async function writeSubtitleFile(
  writeFile: FileWriter,
  outputPath: string,
  text: string,
): Promise<number> {
  const content = new TextEncoder().encode(text);

  try {
    await writeFile(outputPath, content);
  } catch (error) {
    if (isErrnoException(error) && error.code === "EISDIR") {
      throw new CliAppError({
        code: "E_ARG_INVALID",
        message: "--output must be a file path, not a directory",
        details: {
          arg: "output",
          outputPath,
        },
        cause: error,
      });
    }
    throw error;
  }

  return content.byteLength;
}

export function isErrnoException(value: unknown): value is NodeJS.ErrnoException {
  return value instanceof Error && "code" in value;
}

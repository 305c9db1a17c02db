import { readFile } from "fs/promises";

export type FileData = {
  kind: "found";
  data: Buffer;
  size: number;
};

export type NotFound = { kind: "notFound"; path: string };

export type FileLoadResult = FileData | NotFound;

// errno codes that mean "there is no such file to serve"
const MISSING = new Set(["ENOENT", "ENOTDIR", "EISDIR"]);

function errnoCode(err: unknown): string | undefined {
  if (err instanceof Error && "code" in err && typeof err.code === "string") {
    return err.code;
  }
  return undefined;
}

// ----------------------------------------------------
// Read a whole file into memory
// ----------------------------------------------------
export async function fileLoad(filename: string): Promise<FileLoadResult> {
  try {
    const data = await readFile(filename);
    return { kind: "found", data, size: data.length };
  } catch (err) {
    const code = errnoCode(err);
    if (code && MISSING.has(code)) return { kind: "notFound", path: filename };
    throw err;
  }
}

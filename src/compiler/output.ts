import { mkdir, writeFile } from "node:fs/promises";
import { dirname } from "node:path";

/** Write a generated artifact, creating parent directories; returns the path */
export async function writeArtifact(path: string, content: string): Promise<string> {
  await mkdir(dirname(path), { recursive: true });
  await writeFile(path, content, "utf-8");
  return path;
}

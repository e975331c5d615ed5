import { createHash } from "node:crypto";
import { readFile } from "node:fs/promises";
import { resolve } from "node:path";
import type { TaskDefinition } from "../graph/types.js";

/**
 * Default fingerprint: sha256 over the command and the contents of every
 * input file, truncated to 16 hex chars. Tasks without inputs are not
 * cacheable. A missing input file rejects.
 */
export async function fingerprintTask(task: Readonly<TaskDefinition>): Promise<string | undefined> {
  if (!task.inputs || task.inputs.length === 0) return undefined;

  const hash = createHash("sha256");
  hash.update(`command:${task.command ?? ""}\0`);
  for (const input of [...task.inputs].sort()) {
    const path = resolve(task.cwd ?? process.cwd(), input);
    hash.update(`file:${input}\0`);
    hash.update(await readFile(path));
    hash.update("\0");
  }
  return hash.digest("hex").slice(0, 16);
}

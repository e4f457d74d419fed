import fs from "node:fs/promises";
import path from "node:path";

/**
 * Replace `target` so a reader sees either the old content or the new one,
 * never a prefix: write a temp file in the same directory, fsync, rename.
 */
export async function writeFileAtomic(target: string, data: string): Promise<void> {
  const dir = path.dirname(target);
  const tmp = path.join(
    dir,
    `.${path.basename(target)}.${process.pid}.${Date.now()}.tmp`,
  );

  await fs.mkdir(dir, { recursive: true });

  try {
    const handle = await fs.open(tmp, "w");
    try {
      await handle.writeFile(data, "utf8");
      await handle.sync();
    } finally {
      await handle.close();
    }

    await fs.rename(tmp, target);
  } catch (err) {
    await fs.rm(tmp, { force: true });
    throw err;
  }
}

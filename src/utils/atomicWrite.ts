import fs from 'fs/promises';
import path from 'path';

/**
 * Builds a file through a temporary sibling, chunk by chunk, and renames it
 * into place on commit
 *
 * Readers of `filePath` see either the previous content or the committed
 * one, never a partial write.
 */
export class AtomicFileWriter {
  private readonly tempPath: string;
  private opened = false;

  constructor(readonly filePath: string) {
    this.tempPath = `${filePath}.${process.pid}.tmp`;
  }

  async write(content: string | Buffer): Promise<void> {
    if (this.opened) {
      await fs.appendFile(this.tempPath, content);
      return;
    }
    await fs.mkdir(path.dirname(this.filePath), { recursive: true });
    await fs.writeFile(this.tempPath, content);
    this.opened = true;
  }

  async commit(): Promise<void> {
    if (!this.opened) {
      await this.write('');
    }
    await fs.rename(this.tempPath, this.filePath);
    this.opened = false;
  }

  async discard(): Promise<void> {
    await fs.rm(this.tempPath, { force: true });
    this.opened = false;
  }
}

/**
 * Write a whole file atomically
 */
export async function writeFileAtomic(filePath: string, content: string | Buffer): Promise<void> {
  const writer = new AtomicFileWriter(filePath);
  try {
    await writer.write(content);
    await writer.commit();
  } catch (error) {
    await writer.discard();
    throw error;
  }
}

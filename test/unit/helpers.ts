import fs from 'fs/promises';
import os from 'os';
import path from 'path';

export async function makeTempDir(): Promise<string> {
  return fs.mkdtemp(path.join(os.tmpdir(), 'qgraphic-launcher-'));
}

export async function removeTempDir(dir: string): Promise<void> {
  await fs.rm(dir, { recursive: true, force: true });
}

/** Write a file, creating parent directories, with the given mode. */
export async function writeFileWithMode(file: string, content: string, mode: number): Promise<string> {
  await fs.mkdir(path.dirname(file), { recursive: true });
  await fs.writeFile(file, content, 'utf-8');
  await fs.chmod(file, mode);
  return file;
}

export const describePosix = process.platform === 'win32' ? describe.skip : describe;

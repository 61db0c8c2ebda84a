import { access, mkdir, readFile, rename, rm, writeFile } from 'node:fs/promises';
import { constants } from 'node:fs';
import { basename, dirname, join } from 'node:path';
import fg from 'fast-glob';

export async function ensureDir(path: string) {
  await mkdir(path, { recursive: true });
}

export async function pathExists(path: string): Promise<boolean> {
  try {
    await access(path, constants.F_OK);
    return true;
  } catch {
    return false;
  }
}

export async function readJson<T>(file: string): Promise<T> {
  const buf = await readFile(file, 'utf8');
  return JSON.parse(buf) as T;
}

export async function readTextOrUndefined(file: string): Promise<string | undefined> {
  if (!(await pathExists(file))) return undefined;
  return readFile(file, 'utf8');
}

export async function writeJson(file: string, data: unknown) {
  await ensureDir(dirname(file));
  await writeFile(file, `${JSON.stringify(data, null, 2)}\n`, 'utf8');
}

export async function writeText(file: string, content: string) {
  await ensureDir(dirname(file));
  await writeFile(file, content, 'utf8');
}

/**
 * Writes `content` next to `file` under a temporary name, then renames it into
 * place. A failed write removes the temporary file and leaves `file` untouched.
 */
export async function writeFileAtomic(file: string, content: string) {
  const dir = dirname(file);
  await ensureDir(dir);
  const tempFile = join(dir, `.${basename(file)}.${process.pid}.tmp`);
  try {
    await writeFile(tempFile, content, 'utf8');
    await rename(tempFile, file);
  } catch (error) {
    await rm(tempFile, { force: true });
    throw error;
  }
}

export async function listFiles(cwd: string, patterns: string[]): Promise<string[]> {
  if (!(await pathExists(cwd))) return [];
  const files = await fg(patterns, { cwd, onlyFiles: true, dot: false });
  return files.sort();
}

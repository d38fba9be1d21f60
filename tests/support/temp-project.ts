import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';

export interface TempProject {
  rootDir: string;
  appDir: string;
  write: (relativePath: string, content: string) => string;
}

export function withTempProject<T>(run: (project: TempProject) => T | Promise<T>): Promise<T> {
  const rootDir = fs.mkdtempSync(path.join(os.tmpdir(), 'kiln-routes-'));
  fs.writeFileSync(path.join(rootDir, 'package.json'), JSON.stringify({ name: 'tmp', private: true }, null, 2));

  const appDir = path.join(rootDir, 'src', 'app');
  fs.mkdirSync(appDir, { recursive: true });

  const write = (relativePath: string, content: string) => {
    const absolutePath = path.join(rootDir, relativePath);
    fs.mkdirSync(path.dirname(absolutePath), { recursive: true });
    fs.writeFileSync(absolutePath, content);
    return absolutePath;
  };

  return Promise.resolve()
    .then(() => run({ rootDir, appDir, write }))
    .finally(() => {
      fs.rmSync(rootDir, { recursive: true, force: true });
    });
}

/** Swap console.warn for the duration of `run`, returning what was printed. */
export async function captureWarnings(run: () => unknown): Promise<string[]> {
  const warns: string[] = [];
  const originalWarn = console.warn;
  console.warn = (message?: unknown) => {
    warns.push(String(message));
  };

  try {
    await run();
  } finally {
    console.warn = originalWarn;
  }
  return warns;
}

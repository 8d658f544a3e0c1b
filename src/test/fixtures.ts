import { mkdirSync, mkdtempSync, rmSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { dirname, join } from "node:path";

/** A scratch directory with helpers for laying out files below it */
export interface Scratch {
  readonly dir: string;
  readonly path: (...segments: string[]) => string;
  readonly mkdir: (...segments: string[]) => string;
  readonly write: (relative: string, content?: string) => string;
  readonly cleanup: () => void;
}

export const makeScratch = (prefix: string): Scratch => {
  const dir = mkdtempSync(join(tmpdir(), `history-sync-${prefix}-`));

  return {
    dir,
    path: (...segments) => join(dir, ...segments),
    mkdir: (...segments) => {
      const path = join(dir, ...segments);
      mkdirSync(path, { recursive: true });
      return path;
    },
    write: (relative, content = "") => {
      const path = join(dir, relative);
      mkdirSync(dirname(path), { recursive: true });
      writeFileSync(path, content);
      return path;
    },
    cleanup: () => rmSync(dir, { recursive: true, force: true })
  };
};

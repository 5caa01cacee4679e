import * as fs from 'fs';
import * as path from 'path';
import { SharedState } from '@forgeloop/shared';
import { normalizePath } from './glob';

/**
 * Writes a generated project (relative path -> text) under one directory.
 */
export class ProjectWriter {
  private root: string;

  constructor(targetDir: string) {
    this.root = path.resolve(targetDir);
  }

  get targetDir(): string {
    return this.root;
  }

  /**
   * Absolute location of `relativePath`, or null when it leaves the target
   */
  private resolveInside(relativePath: string): string | null {
    const normalized = normalizePath(relativePath);
    if (!normalized || path.isAbsolute(normalized) || /^[a-zA-Z]:/.test(normalized)) {
      return null;
    }

    const fullPath = path.resolve(this.root, normalized);
    const fromRoot = path.relative(this.root, fullPath);
    if (!fromRoot || fromRoot.startsWith('..') || path.isAbsolute(fromRoot)) {
      return null;
    }
    return fullPath;
  }

  /**
   * Check that every path stays inside the target directory
   */
  validateFiles(files: Record<string, string>): { valid: boolean; error?: string } {
    for (const filePath of Object.keys(files)) {
      if (!this.resolveInside(filePath)) {
        return {
          valid: false,
          error: `Generated file escapes the target directory: ${filePath}`,
        };
      }
    }

    return { valid: true };
  }

  /**
   * Write every file, creating parent directories as needed
   */
  materialize(files: Record<string, string>): { success: boolean; written: string[]; error?: string } {
    const validation = this.validateFiles(files);
    if (!validation.valid) {
      return { success: false, written: [], error: validation.error };
    }

    const written: string[] = [];
    try {
      for (const [filePath, content] of Object.entries(files)) {
        const fullPath = this.resolveInside(filePath);
        if (!fullPath) continue;
        fs.mkdirSync(path.dirname(fullPath), { recursive: true });
        fs.writeFileSync(fullPath, content, 'utf-8');
        written.push(normalizePath(filePath));
      }
    } catch (err) {
      return {
        success: false,
        written,
        error: `Failed to write project: ${err instanceof Error ? err.message : String(err)}`,
      };
    }

    return { success: true, written };
  }

  /**
   * Read back a written file
   */
  readFile(filePath: string): string {
    const fullPath = this.resolveInside(filePath);
    if (!fullPath) {
      throw new Error(`Path ${filePath} is outside ${this.root}`);
    }
    if (!fs.existsSync(fullPath)) {
      throw new Error(`File not found: ${filePath}`);
    }

    return fs.readFileSync(fullPath, 'utf-8');
  }
}

/**
 * Persist a run's final blackboard as JSON
 */
export function saveState(filePath: string, state: SharedState): void {
  fs.mkdirSync(path.dirname(path.resolve(filePath)), { recursive: true });
  fs.writeFileSync(filePath, JSON.stringify(state, null, 2), 'utf-8');
}

import { promises as fs } from 'node:fs';
import { dirname, isAbsolute, relative, resolve, sep } from 'node:path';
import { PaperStateError, toValidationIssues } from '../citations/errors.js';
import { paperStateSchema, type PaperState } from './paper-state.js';

const isErrnoException = (error: unknown): error is NodeJS.ErrnoException =>
  error instanceof Error && 'code' in error;

const errorMessage = (error: unknown): string => (error instanceof Error ? error.message : String(error));

/**
 * Saves and loads paper state as JSON files. Paths resolve against `baseDir`
 * and must stay inside it.
 */
export class StateManager {
  constructor(private readonly baseDir: string = process.cwd()) {}

  resolvePath(filePath: string): string {
    const root = resolve(this.baseDir);
    const target = resolve(root, filePath);
    const fromRoot = relative(root, target);

    if (fromRoot === '' || fromRoot === '..' || fromRoot.startsWith(`..${sep}`) || isAbsolute(fromRoot)) {
      throw new PaperStateError(`Path is outside the state directory: ${filePath}`, 'invalid', { filePath });
    }

    return target;
  }

  async saveState(state: PaperState, filePath: string): Promise<string> {
    const target = this.resolvePath(filePath);

    try {
      await fs.mkdir(dirname(target), { recursive: true });
      await fs.writeFile(target, `${JSON.stringify(state, null, 2)}\n`, 'utf8');
    } catch (error) {
      throw new PaperStateError(`Failed to write paper state to ${target}: ${errorMessage(error)}`, 'write_failed', {
        filePath: target
      });
    }

    return target;
  }

  async loadState(filePath: string): Promise<PaperState> {
    const target = this.resolvePath(filePath);

    let raw: string;
    try {
      raw = await fs.readFile(target, 'utf8');
    } catch (error) {
      if (isErrnoException(error) && error.code === 'ENOENT') {
        throw new PaperStateError(`File not found: ${target}`, 'not_found', { filePath: target });
      }
      throw new PaperStateError(`Failed to read paper state from ${target}: ${errorMessage(error)}`, 'invalid', {
        filePath: target
      });
    }

    let json: unknown;
    try {
      json = JSON.parse(raw);
    } catch {
      // The parser's message quotes file content.
      throw new PaperStateError('Paper state is not valid JSON.', 'invalid', { filePath: target });
    }

    const parsed = paperStateSchema.safeParse(json);
    if (!parsed.success) {
      throw new PaperStateError('Paper state does not match the expected schema.', 'invalid', {
        filePath: target,
        issues: toValidationIssues(parsed.error.issues)
      });
    }

    return parsed.data;
  }
}

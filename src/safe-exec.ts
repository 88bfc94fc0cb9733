import execa from 'execa';
import { DEFAULT_TOOL_TIMEOUT_MS } from './constants';

export interface SafeExecResult {
  stdout: string;
  stderr: string;
  code: number | null;
  signal: string | null;
  timedOut: boolean;
  failed: boolean;
  notFound: boolean; // executable missing from PATH (spawn ENOENT)
  durationMs: number;
  start: number;
  errorMessage?: string;
}

// Signature shared by everything that shells out, so tests can substitute a fake runner
export type ExecFn = (cmd: string, args?: string[], timeoutMs?: number) => Promise<SafeExecResult>;

export function isToolSkipped(tool: string): boolean {
  const skip = (process.env.BRCMFW_SKIP_TOOLS || '')
    .split(',')
    .map(s => s.trim())
    .filter(Boolean);
  return skip.includes(tool);
}

function isExecaError(value: unknown): value is execa.ExecaError {
  return value instanceof Error && 'shortMessage' in value;
}

function describeError(e: unknown): string {
  if (isExecaError(e)) return e.shortMessage;
  if (e instanceof Error) return e.message;
  return String(e);
}

export async function safeExec(cmd: string, args: string[] = [], timeoutMs?: number): Promise<SafeExecResult> {
  const start = Date.now();
  if (isToolSkipped(cmd)) {
    return {
      stdout: '',
      stderr: '',
      code: null,
      signal: null,
      timedOut: false,
      failed: true,
      notFound: true,
      durationMs: Date.now() - start,
      start,
      errorMessage: 'skipped-by-config'
    };
  }
  try {
    const child = await execa(cmd, args, {
      timeout: timeoutMs || DEFAULT_TOOL_TIMEOUT_MS,
      reject: false // handle failures uniformly
    });
    const timedOut = child.timedOut === true;
    const failed = timedOut || child.failed || child.exitCode !== 0;
    // with reject:false spawn failures come back as the error object itself
    const spawnError = isExecaError(child) ? child.shortMessage : undefined;
    const notFound = !!spawnError && /ENOENT/.test(spawnError);
    return {
      stdout: child.stdout || '',
      stderr: child.stderr || '',
      code: typeof child.exitCode === 'number' ? child.exitCode : null,
      signal: child.signal || null,
      timedOut,
      failed,
      notFound,
      durationMs: Date.now() - start,
      start,
      errorMessage: failed ? (timedOut ? 'timeout' : spawnError || child.stderr || 'non-zero-exit') : undefined
    };
  } catch (e: unknown) {
    const message = describeError(e);
    const timedOut = isExecaError(e) && e.timedOut === true;
    return {
      stdout: isExecaError(e) ? e.stdout || '' : '',
      stderr: isExecaError(e) ? e.stderr || '' : '',
      code: isExecaError(e) && typeof e.exitCode === 'number' ? e.exitCode : null,
      signal: isExecaError(e) ? e.signal || null : null,
      timedOut,
      failed: true,
      notFound: /ENOENT/.test(message),
      durationMs: Date.now() - start,
      start,
      errorMessage: timedOut ? 'timeout' : message || 'exec-error'
    };
  }
}

export function getConfiguredTimeout(): number {
  return DEFAULT_TOOL_TIMEOUT_MS;
}

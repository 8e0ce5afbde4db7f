import { execFile } from 'child_process';
import { promisify } from 'util';

const execFileAsync = promisify(execFile);

export interface CommandResult {
  stdout: string;
  stderr: string;
}

export class CommandError extends Error {
  constructor(
    message: string,
    public exitCode: number,
    public stdout: string,
    public stderr: string
  ) {
    super(message);
    this.name = 'CommandError';
  }
}

export async function runCommand(
  command: string,
  args: string[],
  options: { cwd?: string; timeoutMs?: number; signal?: AbortSignal } = {}
): Promise<CommandResult> {
  try {
    const { stdout, stderr } = await execFileAsync(command, args, {
      cwd: options.cwd,
      timeout: options.timeoutMs,
      signal: options.signal,
      encoding: 'utf8',
      maxBuffer: 64 * 1024 * 1024,
    });
    return { stdout, stderr };
  } catch (err) {
    const stdout = readStringField(err, 'stdout');
    const stderr = readStringField(err, 'stderr') || (err instanceof Error ? err.message : '');
    const code = err instanceof Error && 'code' in err ? err.code : undefined;
    const exitCode = typeof code === 'number' ? code : 1;
    throw new CommandError(
      `Command failed (${command} ${args.join(' ')}): code=${exitCode}\nSTDERR: ${stderr}`,
      exitCode,
      stdout,
      stderr
    );
  }
}

function readStringField(err: unknown, field: 'stdout' | 'stderr'): string {
  if (typeof err === 'object' && err !== null && field in err) {
    const value: unknown = Reflect.get(err, field);
    return typeof value === 'string' ? value : '';
  }
  return '';
}

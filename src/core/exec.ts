import { logger } from './logger';
import { AppError, ERROR_CODES } from './errors';

export interface ExecResult {
  stdout: string;
  stderr: string;
  code: number;
  durationMs: number;
}

export interface RunOptions {
  cwd?: string;
  timeout?: number;
}

/** Subprocess boundary. Services take one of these so tests can stand in for yt-dlp and ffmpeg. */
export type CommandRunner = (command: string, args: string[], options?: RunOptions) => Promise<ExecResult>;

let execaModulePromise: Promise<typeof import('execa')> | null = null;

async function getExeca() {
  if (!execaModulePromise) {
    execaModulePromise = import('execa');
  }
  return execaModulePromise;
}

function readString(source: object, key: string): string {
  const value: unknown = Reflect.get(source, key);
  return typeof value === 'string' ? value : '';
}

export async function run(command: string, args: string[] = [], options: RunOptions = {}): Promise<ExecResult> {
  const startTime = Date.now();

  const { execa } = await getExeca();

  logger.debug({ command, args, cwd: options.cwd, timeout: options.timeout }, 'Executing command');

  try {
    const execaOptions: { cwd?: string; timeout?: number } = {};
    if (options.cwd) execaOptions.cwd = options.cwd;
    if (options.timeout) execaOptions.timeout = options.timeout;

    const result = await execa(command, args, execaOptions);
    const durationMs = Date.now() - startTime;

    logger.debug(
      {
        command,
        durationMs,
        code: result.exitCode,
        stdoutLength: result.stdout.length,
        stderrLength: result.stderr.length,
      },
      'Command executed successfully'
    );

    return {
      stdout: result.stdout,
      stderr: result.stderr,
      code: result.exitCode,
      durationMs,
    };
  } catch (error) {
    const durationMs = Date.now() - startTime;

    if (error instanceof Error && 'exitCode' in error && typeof error.exitCode === 'number') {
      const stdout = readString(error, 'stdout');
      const stderr = readString(error, 'stderr');

      logger.error(
        {
          command,
          args: args.slice(0, 10),
          durationMs,
          code: error.exitCode,
          stdoutPreview: stdout.slice(0, 1000),
          stderrPreview: stderr.slice(-1000),
        },
        'Command execution failed'
      );

      return {
        stdout,
        stderr,
        code: error.exitCode || 1,
        durationMs,
      };
    }

    if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
      logger.error({ command, durationMs }, 'Command not found on PATH');
      throw new AppError(ERROR_CODES.ERR_TOOL_NOT_FOUND, `${command} was not found on PATH`, { command });
    }

    logger.error(
      {
        command,
        args,
        durationMs,
        error: error instanceof Error ? error.message : String(error),
      },
      'Unexpected error during command execution'
    );

    throw error;
  }
}

import { spawn } from 'node:child_process';
import { mkdir, stat } from 'node:fs/promises';
import { dirname } from 'node:path';
import type { CaptureRequest, CaptureToolResult } from '../../ports/CaptureToolPort.js';
import type { Logger } from '../../utils/logger.js';
import { isErrnoException } from '../../utils/errors.js';

const STDERR_TAIL = 500;

interface ProcessExit {
  code: number | null;
  signal: NodeJS.Signals | null;
  stderr: string;
}

/** Splits a command template and substitutes `{url}` and `{dest}` in every argument. */
export function buildArgv(template: string, url: string, destination: string): string[] {
  return template
    .trim()
    .split(/\s+/)
    .filter(Boolean)
    .map((part) => part.replaceAll('{url}', url).replaceAll('{dest}', destination));
}

function isHttpUrl(value: string): boolean {
  try {
    const { protocol } = new URL(value);
    return protocol === 'http:' || protocol === 'https:';
  } catch {
    return false;
  }
}

/**
 * Runs one capture tool invocation. Success requires a zero exit status and a regular
 * file at the destination; everything else is reported with the reason preserved.
 */
export async function runCaptureCommand(
  template: string,
  request: CaptureRequest,
  logger: Logger
): Promise<CaptureToolResult> {
  if (!isHttpUrl(request.url)) {
    return { status: 'error', reason: `Not an http(s) URL: ${request.url}`, retryable: false };
  }
  const [command, ...args] = buildArgv(template, request.url, request.destination);
  if (!command) {
    return { status: 'error', reason: 'Capture command is empty', retryable: false };
  }

  try {
    await mkdir(dirname(request.destination), { recursive: true });
  } catch (error) {
    return { status: 'error', reason: `Cannot create ${dirname(request.destination)}: ${String(error)}`, retryable: true };
  }

  const exit = await new Promise<CaptureToolResult | ProcessExit>(
    (resolve) => {
      let stderr = '';
      let settled = false;
      const finish = (value: CaptureToolResult | ProcessExit): void => {
        if (!settled) {
          settled = true;
          resolve(value);
        }
      };

      logger.debug({ command, args }, 'Spawning capture tool');
      const child = spawn(command, args, {
        signal: request.signal,
        killSignal: 'SIGKILL',
        stdio: ['ignore', 'ignore', 'pipe'],
      });

      child.stderr?.setEncoding('utf8');
      child.stderr?.on('data', (chunk: string) => {
        stderr = (stderr + chunk).slice(-STDERR_TAIL);
      });

      child.on('error', (error: Error) => {
        if (isErrnoException(error) && error.code === 'ENOENT') {
          finish({ status: 'error', reason: `Capture tool not found: ${command}`, retryable: false });
        } else if (error.name === 'AbortError') {
          finish({ status: 'error', reason: 'Capture aborted', retryable: true });
        } else {
          finish({ status: 'error', reason: `Failed to run ${command}: ${error.message}`, retryable: true });
        }
      });

      child.on('close', (code: number | null, signal: NodeJS.Signals | null) => {
        finish({ code, signal, stderr: stderr.trim() });
      });
    }
  );

  if ('status' in exit) {
    return exit;
  }
  if (exit.code !== 0) {
    const how = exit.signal ? `killed by ${exit.signal}` : `exited with code ${exit.code}`;
    const detail = exit.stderr ? `: ${exit.stderr}` : '';
    return { status: 'error', reason: `${command} ${how}${detail}`, retryable: true };
  }

  try {
    const produced = await stat(request.destination);
    if (!produced.isFile()) {
      return { status: 'error', reason: `${command} did not produce a file at ${request.destination}`, retryable: true };
    }
  } catch {
    return { status: 'error', reason: `${command} exited 0 but ${request.destination} is missing`, retryable: true };
  }

  return { status: 'ok', path: request.destination };
}

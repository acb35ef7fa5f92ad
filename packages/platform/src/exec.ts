import { spawn } from 'child_process';

export interface RunOptions {
  input?: string | Uint8Array;
  /**
   * `ignore` detaches stdout/stderr and settles when the process exits, even if
   * a forked child (xclip keeps one to own the selection) is still running.
   */
  output?: 'pipe' | 'ignore';
}

export type CommandRunner = (command: string, args: string[], options?: RunOptions) => Promise<Buffer>;

const exitFailure = (command: string, code: number | null, details = '') =>
  new Error(`${command} exited with code ${code}${details ? `: ${details}` : ''}`);

export const runCommand: CommandRunner = (command, args, options = {}) =>
  new Promise<Buffer>((resolve, reject) => {
    if (options.output === 'ignore') {
      const child = spawn(command, args, { stdio: ['pipe', 'ignore', 'ignore'] });
      child.on('error', reject);
      child.on('exit', (code) => {
        if (code === 0) resolve(Buffer.alloc(0));
        else reject(exitFailure(command, code));
      });
      child.stdin.end(options.input ?? '');
      return;
    }

    const child = spawn(command, args, { stdio: ['pipe', 'pipe', 'pipe'] });
    const stdout: Buffer[] = [];
    const stderr: Buffer[] = [];
    child.stdout.on('data', (chunk: Buffer) => stdout.push(chunk));
    child.stderr.on('data', (chunk: Buffer) => stderr.push(chunk));
    child.on('error', reject);
    child.on('close', (code) => {
      if (code === 0) {
        resolve(Buffer.concat(stdout));
        return;
      }
      reject(exitFailure(command, code, Buffer.concat(stderr).toString('utf-8').trim()));
    });
    child.stdin.end(options.input ?? '');
  });

export const runText = async (runner: CommandRunner, command: string, args: string[], options?: RunOptions) =>
  (await runner(command, args, options)).toString('utf-8');

import { spawn } from 'node:child_process';
import { logger } from './logger.js';

const forwardedSignals: NodeJS.Signals[] = ['SIGINT', 'SIGTERM', 'SIGHUP'];

const signalExitCodes: Record<string, number> = {
  SIGHUP: 129,
  SIGINT: 130,
  SIGTERM: 143,
};

/**
 * Run a command with inherited stdio and resolve with its exit code.
 *
 * Termination signals received meanwhile are passed on to the child so the
 * caller's cleanup still runs after it exits.
 */
export function runCommand(argv: readonly string[], env: NodeJS.ProcessEnv): Promise<number> {
  const [command, ...args] = argv;
  if (!command) {
    return Promise.reject(new Error('No command given'));
  }

  return new Promise((resolve, reject) => {
    const child = spawn(command, args, { env, stdio: 'inherit', shell: false });

    const forward = (signal: NodeJS.Signals) => {
      logger.warn({ signal }, 'Forwarding signal to command');
      child.kill(signal);
    };
    for (const signal of forwardedSignals) process.on(signal, forward);
    const detach = () => {
      for (const signal of forwardedSignals) process.off(signal, forward);
    };

    child.on('error', (error) => {
      detach();
      reject(error);
    });
    child.on('close', (code, signal) => {
      detach();
      resolve(code ?? (signal ? signalExitCodes[signal] ?? 1 : 1));
    });
  });
}

import { describe, it, expect } from 'vitest';
import { runCommand } from './process.js';

describe('runCommand', () => {
  it('resolves with the exit code of the command', async () => {
    await expect(runCommand([process.execPath, '-e', 'process.exit(3)'], process.env)).resolves.toBe(3);
  });

  it('passes the given environment to the command', async () => {
    const script = "process.exit(process.env.FIXTURE_MARKER === 'yes' ? 0 : 5)";
    await expect(runCommand([process.execPath, '-e', script], { FIXTURE_MARKER: 'yes' })).resolves.toBe(0);
  });

  it('rejects an empty command line', async () => {
    await expect(runCommand([], process.env)).rejects.toThrow('No command given');
  });

  it('rejects a command that cannot be started', async () => {
    await expect(runCommand(['/nonexistent/fixture-harness-command'], process.env)).rejects.toThrow();
  });
});

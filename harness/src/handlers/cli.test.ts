import { describe, it, expect, afterEach } from 'vitest';
import { existsSync } from 'node:fs';
import { writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import { ExitCode } from '@fixture-harness/shared';
import type { HarnessEnv } from '../lib/config.js';
import { createApiClient } from '../lib/services/session.js';
import { StubApiClient, cleanupTempDirs, makeTempDir, response } from '../test/stub-client.js';
import { childEnv, main, type CliDependencies } from './cli.js';

const identityBody = {
  Account: '111122223333',
  UserId: 'AIDATESTUSER',
  Arn: 'arn:aws:iam::111122223333:user/alice',
};

const reservation = (id: string) => ({ Reservations: [{ OwnerId: '111122223333', Instances: [{ InstanceId: id }] }] });

type CommandBody = (env: HarnessEnv) => Promise<number>;

function fakeDeps(body: CommandBody, env: HarnessEnv = {}) {
  const printed: string[] = [];
  const commands: Array<{ argv: readonly string[]; env: NodeJS.ProcessEnv }> = [];
  const deps: CliDependencies = {
    env,
    runCommand: async (argv, childEnvironment) => {
      commands.push({ argv, env: childEnvironment });
      return body(childEnvironment);
    },
    liveClient: () => new StubApiClient().respond('sts:GetCallerIdentity', response(identityBody)),
    localUsername: () => 'alice',
    placeholders: { ACCOUNT_ID: '123456789012', USER_ID: 'AIDAFIXTUREUSERID0000', LOCAL_USER: 'fixture-user' },
    print: (line) => printed.push(line),
  };
  return { deps, printed, commands };
}

const run = (deps: CliDependencies, ...args: string[]) => main(['node', 'fixture-harness', ...args], deps);

// Test body standing in for the wrapped command: two DescribeInstances calls
function describeTwice(live: StubApiClient, seen: string[]): CommandBody {
  return async (env) => {
    const client = await createApiClient(env, { defaults: { region: 'us-east-1' }, live: () => live });
    for (let i = 0; i < 2; i++) {
      const { body } = await client.invoke('ec2:DescribeInstances');
      seen.push(JSON.stringify(body));
    }
    return 0;
  };
}

describe('cli', () => {
  afterEach(cleanupTempDirs);

  describe('childEnv', () => {
    it('replaces harness flags and drops unset values', () => {
      const env = childEnv(
        { PATH: '/usr/bin', _FIXTURE_REPLAY: '/old', _FIXTURE_RECORD: '/older', EMPTY: undefined },
        { _FIXTURE_RECORD: '/rec' }
      );
      expect(env).toEqual({ PATH: '/usr/bin', _FIXTURE_RECORD: '/rec' });
    });
  });

  describe('record and replay', () => {
    it('records a command, then replays it from the archive', async () => {
      const root = await makeTempDir();
      const dir = join(root, 'rec');
      const archive = join(root, 'fixtures.json.gz');

      const live = new StubApiClient().respond(
        'ec2:DescribeInstances',
        response(reservation('i-0first')),
        response(reservation('i-0second'))
      );
      const recorded: string[] = [];
      const recording = fakeDeps(describeTwice(live, recorded));

      expect(await run(recording.deps, 'record', '--dir', dir, '--archive', archive, '--', 'npm', 'test')).toBe(0);
      expect(recording.commands[0]?.argv).toEqual(['npm', 'test']);
      expect(recording.commands[0]?.env._FIXTURE_RECORD).toBe(dir);
      expect(existsSync(dir)).toBe(false);
      expect(existsSync(archive)).toBe(true);

      const replayed: string[] = [];
      const offline = new StubApiClient();
      const replaying = fakeDeps(describeTwice(offline, replayed));

      expect(await run(replaying.deps, 'replay', '--archive', archive, '--', 'npm', 'test')).toBe(0);
      expect(offline.calls).toEqual([]);
      expect(replayed).toEqual([
        JSON.stringify(reservation('i-0first')).replaceAll('111122223333', '123456789012'),
        JSON.stringify(reservation('i-0second')).replaceAll('111122223333', '123456789012'),
      ]);

      const scratch = replaying.commands[0]?.env._FIXTURE_REPLAY;
      expect(scratch).toBeDefined();
      expect(scratch !== undefined && existsSync(scratch)).toBe(false);
    });

    it('returns the command exit code and keeps the recording when the command fails', async () => {
      const root = await makeTempDir();
      const dir = join(root, 'rec');
      const archive = join(root, 'fixtures.json.gz');
      const { deps } = fakeDeps(async () => 3);

      expect(await run(deps, 'record', '--dir', dir, '--archive', archive, '--', 'npm', 'test')).toBe(3);
      expect(existsSync(join(dir, '_session.json'))).toBe(true);
      expect(existsSync(archive)).toBe(false);
    });

    it('refuses to record over a stale directory without running the command', async () => {
      const root = await makeTempDir();
      const { deps, commands } = fakeDeps(async () => 0);

      expect(await run(deps, 'record', '--dir', root, '--archive', join(root, 'a.json.gz'), '--', 'true')).toBe(
        ExitCode.PRECONDITION
      );
      expect(commands).toEqual([]);
    });

    it('refuses to record under the split harness', async () => {
      const root = await makeTempDir();
      const { deps, commands } = fakeDeps(async () => 0, { FIXTURE_SPLIT_HARNESS: '1' });

      expect(
        await run(deps, 'record', '--dir', join(root, 'rec'), '--archive', join(root, 'a.json.gz'), '--', 'true')
      ).toBe(ExitCode.PRECONDITION);
      expect(commands).toEqual([]);
      expect(existsSync(join(root, 'rec'))).toBe(false);
    });

    it('fails replay of a missing archive as a pre-condition', async () => {
      const root = await makeTempDir();
      const { deps, commands } = fakeDeps(async () => 0);

      expect(await run(deps, 'replay', '--archive', join(root, 'missing.json.gz'), '--', 'true')).toBe(
        ExitCode.PRECONDITION
      );
      expect(commands).toEqual([]);
    });
  });

  describe('scrub', () => {
    it('prints the files it rewrote', async () => {
      const dir = await makeTempDir();
      await writeFile(join(dir, 'sts.GetCallerIdentity.json'), JSON.stringify(identityBody), 'utf8');
      const { deps, printed } = fakeDeps(async () => 0);

      expect(
        await run(deps, 'scrub', '--dir', dir, '--account-id', '111122223333', '--user-id', 'AIDATESTUSER')
      ).toBe(0);
      expect(printed).toEqual(['{"scrubbed":["sts.GetCallerIdentity.json"]}']);
    });
  });

  describe('inspect', () => {
    it('summarizes an archive', async () => {
      const root = await makeTempDir();
      const archive = join(root, 'fixtures.json.gz');
      const live = new StubApiClient().respond(
        'ec2:DescribeInstances',
        response(reservation('i-0first')),
        response(reservation('i-0second'))
      );
      const recording = fakeDeps(describeTwice(live, []));
      await run(recording.deps, 'record', '--dir', join(root, 'rec'), '--archive', archive, '--', 'true');

      const { deps, printed } = fakeDeps(async () => 0);
      expect(await run(deps, 'inspect', '--archive', archive)).toBe(0);

      const summary: unknown = JSON.parse(printed[0] ?? '{}');
      expect(summary).toEqual({
        sessionId: expect.stringMatching(/^[0-9A-HJKMNP-TV-Z]{26}$/),
        createdAt: expect.any(String),
        calls: 2,
        failedCalls: 0,
        operations: { 'ec2:DescribeInstances': 2 },
      });
    });
  });
});

import { ProfileActivator } from '../../core/profile.activator';
import { createProfile } from '../../types/profile.types';
import { RecordingIdentityWriter, RecordingKeyAgent } from '../helpers/fakes';
import * as path from 'path';
import * as fs from 'fs-extra';
import * as os from 'os';

describe('ProfileActivator', () => {
  let tempDir: string;
  let keyPath: string;
  let writer: RecordingIdentityWriter;
  let agent: RecordingKeyAgent;
  let activator: ProfileActivator;

  beforeEach(async () => {
    tempDir = await fs.mkdtemp(path.join(os.tmpdir(), 'git-profiles-activator-'));
    keyPath = path.join(tempDir, 'id_work');
    await fs.writeFile(keyPath, 'test-key');
    writer = new RecordingIdentityWriter();
    agent = new RecordingKeyAgent();
    activator = new ProfileActivator(writer, agent);
  });

  afterEach(async () => {
    await fs.remove(tempDir);
  });

  it('should apply every configured setting in order', async () => {
    const profile = createProfile('work', {
      username: 'alice',
      email: 'a@x.com',
      defaultBranch: 'trunk',
      sshKeyPath: keyPath,
    });

    const report = await activator.activate(profile);

    expect(writer.calls).toEqual([
      { key: 'user.name', value: 'alice' },
      { key: 'user.email', value: 'a@x.com' },
      { key: 'init.defaultBranch', value: 'trunk' },
    ]);
    expect(agent.added).toEqual([keyPath]);
    expect(report).toEqual({
      profileName: 'work',
      success: true,
      steps: [
        { step: 'user.name', status: 'applied', value: 'alice' },
        { step: 'user.email', status: 'applied', value: 'a@x.com' },
        { step: 'init.defaultBranch', status: 'applied', value: 'trunk' },
        { step: 'ssh-key', status: 'applied', value: keyPath },
      ],
    });
  });

  it('should skip empty identity fields', async () => {
    const report = await activator.activate(createProfile('bare', { defaultBranch: '' }));

    expect(writer.calls).toEqual([]);
    expect(report.success).toBe(true);
    expect(report.steps.map(step => step.status)).toEqual(['skipped', 'skipped', 'skipped', 'skipped']);
  });

  it('should write whitespace values as given', async () => {
    const report = await activator.activate(createProfile('spaced', { username: ' ' }));

    expect(writer.calls).toEqual([
      { key: 'user.name', value: ' ' },
      { key: 'init.defaultBranch', value: 'main' },
    ]);
    expect(report.steps[0]).toEqual({ step: 'user.name', status: 'applied', value: ' ' });
  });

  it('should keep going after a failed identity write and report failure', async () => {
    writer.failOn('user.email');
    const profile = createProfile('work', { username: 'alice', email: 'a@x.com', sshKeyPath: keyPath });

    const report = await activator.activate(profile);

    expect(report.success).toBe(false);
    expect(report.steps[1]).toEqual({
      step: 'user.email',
      status: 'failed',
      value: 'a@x.com',
      error: {
        kind: 'IDENTITY_WRITE_FAILED',
        message: 'Failed to set global user.email: could not lock config file',
      },
    });
    expect(writer.calls.map(call => call.key)).toEqual(['user.name', 'user.email', 'init.defaultBranch']);
    expect(agent.added).toEqual([keyPath]);
  });

  it('should report a plain error thrown by the identity writer', async () => {
    jest.spyOn(writer, 'set').mockRejectedValueOnce(new Error('git not found'));

    const report = await activator.activate(createProfile('work', { username: 'alice' }));

    expect(report.success).toBe(false);
    expect(report.steps[0]?.error).toEqual({ kind: 'IDENTITY_WRITE_FAILED', message: 'git not found' });
  });

  it('should succeed when only the SSH agent is unavailable', async () => {
    agent.makeUnavailable();
    const profile = createProfile('work', { username: 'alice', sshKeyPath: keyPath });

    const report = await activator.activate(profile);

    expect(report.success).toBe(true);
    expect(report.steps[3]).toEqual({
      step: 'ssh-key',
      status: 'failed',
      value: keyPath,
      error: {
        kind: 'AGENT_UNAVAILABLE',
        message: 'Could not open a connection to your authentication agent',
      },
    });
  });

  it('should never contact the agent without a key path', async () => {
    agent.makeUnavailable();

    const report = await activator.activate(createProfile('work', { username: 'alice' }));

    expect(agent.added).toEqual([]);
    expect(report.steps[3]).toEqual({ step: 'ssh-key', status: 'skipped', reason: 'not set' });
    expect(report.steps.some(step => step.error?.kind === 'AGENT_UNAVAILABLE')).toBe(false);
  });

  it('should skip a key file that does not exist', async () => {
    const missing = path.join(tempDir, 'id_missing');

    const report = await activator.activate(createProfile('work', { sshKeyPath: missing }));

    expect(agent.added).toEqual([]);
    expect(report.steps[3]).toEqual({
      step: 'ssh-key',
      status: 'skipped',
      value: missing,
      reason: 'key file not found',
    });
  });
});

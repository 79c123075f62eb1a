import { ProfileCommand, formatStep } from '../../commands/profile.command';
import { DuplicateProfileError, InvalidFormatError } from '../../errors/store.error';
import { RecordingIdentityWriter, RecordingKeyAgent } from '../helpers/fakes';
import * as path from 'path';
import * as fs from 'fs-extra';
import * as os from 'os';

describe('ProfileCommand', () => {
  let tempDir: string;
  let writer: RecordingIdentityWriter;
  let agent: RecordingKeyAgent;
  let command: ProfileCommand;
  let logSpy: jest.SpyInstance;
  let warnSpy: jest.SpyInstance;

  beforeEach(async () => {
    tempDir = await fs.mkdtemp(path.join(os.tmpdir(), 'git-profiles-command-'));
    writer = new RecordingIdentityWriter();
    agent = new RecordingKeyAgent();
    command = new ProfileCommand(tempDir, { identityWriter: writer, keyAgent: agent });
    logSpy = jest.spyOn(console, 'log').mockImplementation(() => undefined);
    warnSpy = jest.spyOn(console, 'warn').mockImplementation(() => undefined);
  });

  afterEach(async () => {
    logSpy.mockRestore();
    warnSpy.mockRestore();
    await fs.remove(tempDir);
  });

  describe('add', () => {
    it('should add a profile', async () => {
      const result = await command.add('work', { username: 'alice', email: 'a@x.com' });

      expect(result.success).toBe(true);
      expect(result.message).toBe('Added profile: work');
      expect(result.exitCode).toBe(0);
      expect(command.getStore().get('work')?.email).toBe('a@x.com');
    });

    it('should fail for a duplicate name', async () => {
      await command.add('work');

      const result = await command.add('work', { username: 'bob' });

      expect(result.success).toBe(false);
      expect(result.exitCode).toBe(1);
      expect(result.message).toBe("Profile 'work' already exists");
      expect(result.error).toBeInstanceOf(DuplicateProfileError);
    });
  });

  describe('edit', () => {
    it('should update the given fields', async () => {
      await command.add('work', { username: 'alice' });

      const result = await command.edit('work', { email: 'alice@corp.example', username: undefined });

      expect(result.message).toBe('Updated profile: work');
      expect(result.data?.username).toBe('alice');
      expect(result.data?.email).toBe('alice@corp.example');
    });

    it('should fail for an unknown profile', async () => {
      const result = await command.edit('ghost', { email: 'x@y.z' });

      expect(result.success).toBe(false);
      expect(result.message).toBe("Profile 'ghost' does not exist");
    });
  });

  describe('remove', () => {
    it('should mention clearing the active profile', async () => {
      await command.add('work', { username: 'alice' });
      await command.switch('work');

      const result = await command.remove('work');

      expect(result.message).toBe("Removed profile 'work' and cleared current profile");
      expect(command.getStore().getCurrent()).toBeNull();
    });

    it('should remove an inactive profile', async () => {
      await command.add('home');

      const result = await command.remove('home');

      expect(result.message).toBe('Removed profile: home');
    });
  });

  describe('switch', () => {
    it('should apply the profile and make it current', async () => {
      await command.add('work', { username: 'alice', email: 'a@x.com' });

      const result = await command.switch('work');

      expect(result.success).toBe(true);
      expect(result.message).toBe('Switched to profile: work');
      expect(result.data?.state).toBe('committed');
      expect(writer.values.get('user.name')).toBe('alice');
      expect(command.getStore().getCurrent()?.name).toBe('work');
      expect(logSpy).toHaveBeenCalledWith('  ✓ user.name: alice');
      expect(logSpy).toHaveBeenCalledWith('  Email: a@x.com');
    });

    it('should report a failed identity write and keep the current profile', async () => {
      await command.add('work', { username: 'alice', email: 'a@x.com' });
      writer.failOn('user.name');

      const result = await command.switch('work');

      expect(result.success).toBe(false);
      expect(result.exitCode).toBe(1);
      expect(result.message).toBe("Failed to switch to profile 'work'; current profile unchanged");
      expect(command.getStore().getCurrent()).toBeNull();
      expect(warnSpy).toHaveBeenCalledWith(
        '! Warn:',
        '  ✗ user.name: Failed to set global user.name: could not lock config file',
      );
    });

    it('should fail for an unknown profile', async () => {
      const result = await command.switch('ghost');

      expect(result.success).toBe(false);
      expect(result.message).toBe("Profile 'ghost' does not exist");
      expect(writer.calls).toEqual([]);
    });
  });

  describe('current', () => {
    it('should report no active profile', async () => {
      const result = await command.current();

      expect(result.success).toBe(true);
      expect(result.message).toBe('No active profile');
      expect(result.data?.profile).toBeNull();
    });

    it('should show the active profile with the live git identity', async () => {
      await command.add('work', { username: 'alice', email: 'a@x.com' });
      await command.switch('work');

      const result = await command.current();

      expect(result.message).toBe('Current profile: work');
      expect(result.data).toEqual({
        profile: expect.objectContaining({ name: 'work' }),
        gitUserName: 'alice',
        gitUserEmail: 'a@x.com',
      });
    });

    it('should warn when the global identity no longer matches', async () => {
      await command.add('work', { username: 'alice' });
      await command.switch('work');
      writer.values.set('user.name', 'someone-else');

      await command.current();

      expect(warnSpy).toHaveBeenCalledWith('! Warn:', "Global user.name is 'someone-else', not 'alice'");
    });
  });

  describe('list', () => {
    it('should report an empty store', async () => {
      const result = await command.list();

      expect(result.message).toBe('No profiles configured.');
      expect(result.data).toEqual([]);
    });

    it('should mark the active profile', async () => {
      await command.add('work', { username: 'alice' });
      await command.add('home');
      await command.switch('work');

      const result = await command.list();

      expect(result.message).toBe('2 profile(s) configured');
      expect(logSpy).toHaveBeenCalledWith('✓ Active   work');
      expect(logSpy).toHaveBeenCalledWith('  Inactive home');
      expect(logSpy).toHaveBeenCalledWith('    Username: alice');
    });
  });

  describe('export and import', () => {
    it('should round-trip through a file', async () => {
      await command.add('work', { username: 'alice', email: 'a@x.com' });
      await command.switch('work');
      const exportPath = path.join(tempDir, 'backup.json');

      const exported = await command.export(exportPath);
      const other = new ProfileCommand(path.join(tempDir, 'other'), {
        identityWriter: writer,
        keyAgent: agent,
      });
      const imported = await other.import(exportPath);

      expect(exported.message).toBe(`Configuration exported to ${exportPath}`);
      expect(imported.message).toBe(`Configuration imported from ${exportPath}`);
      expect(imported.data).toEqual(command.getStore().load());
    });

    it('should reject an invalid import file', async () => {
      const importPath = path.join(tempDir, 'invalid.json');
      await fs.writeJson(importPath, { something: 'else' });

      const result = await command.import(importPath);

      expect(result.success).toBe(false);
      expect(result.error).toBeInstanceOf(InvalidFormatError);
    });
  });

  describe('vscode', () => {
    it('should write the editor settings file', async () => {
      await command.add('work');

      const result = await command.vscode();

      const settingsPath = path.join(tempDir, 'vscode_settings.json');
      expect(result.message).toBe(`Editor settings created: ${settingsPath}`);
      expect(await fs.pathExists(settingsPath)).toBe(true);
    });
  });
});

describe('formatStep', () => {
  it('should render each step status', () => {
    expect(formatStep({ step: 'user.email', status: 'applied', value: 'a@x.com' })).toBe(
      '  ✓ user.email: a@x.com',
    );
    expect(formatStep({ step: 'ssh-key', status: 'skipped', reason: 'key file not found' })).toBe(
      '  - ssh-key: skipped (key file not found)',
    );
    expect(
      formatStep({
        step: 'ssh-key',
        status: 'failed',
        error: { kind: 'AGENT_UNAVAILABLE', message: 'ssh-add timed out after 10s' },
      }),
    ).toBe('  ✗ ssh-key: ssh-add timed out after 10s');
  });
});

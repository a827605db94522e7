import path from 'path';
import fs from 'fs/promises';
import { defaultConfig } from '../../../src/config/loader.js';
import { SafetyGate } from '../../../src/safety/gate.js';
import { SourceReconciler } from '../../../src/sources/reconciler.js';
import { ToolRegistry } from '../../../src/tools/registry.js';
import { registerSourceTools } from '../../../src/tools/sources/index.js';
import { consentFor, registerLockTools } from '../../../src/tools/lock/index.js';
import { mcpAnnotations } from '../../../src/tools/helpers.js';
import type { ServerContext } from '../../../src/tools/context.js';
import type { AppConfig } from '../../../src/types/config.js';
import type { ToolResponse } from '../../../src/types/response.js';
import { FakeClock, RecordingSignaller, ScriptedProbe, makeTmpDir } from '../../helpers/fakes.js';

const LINE = 'deb http://example.org/repo stable main';
const HOLDER = 4242;

describe('tools', () => {
  let tmpDir: string;
  let mainList: string;
  let extra: string;
  let clock: FakeClock;
  let probe: ScriptedProbe;
  let ctx: ServerContext;

  function buildContext(signaller = new RecordingSignaller(), safety: Partial<AppConfig['safety']> = {}): ServerContext {
    const base = defaultConfig();
    const config = {
      ...base,
      safety: { ...base.safety, ...safety },
      sources: { ...base.sources, main_list: mainList, parts_dir: path.join(tmpDir, 'sources.list.d') },
      backup: { root: path.join(tmpDir, 'backups') },
    };
    const context: ServerContext = {
      config,
      reconciler: new SourceReconciler({ config }),
      lockProbe: probe,
      signaller,
      safetyGate: new SafetyGate(config.safety),
      registry: new ToolRegistry(),
      clock,
      osReleasePath: path.join(tmpDir, 'os-release'),
      configPath: path.join(tmpDir, 'config.yaml'),
      firstRun: false,
    };
    registerSourceTools(context);
    registerLockTools(context);
    return context;
  }

  function metadataOf(name: string) {
    const tool = ctx.registry.get(name);
    if (!tool) throw new Error(`tool ${name} is not registered`);
    return tool.metadata;
  }

  async function call(name: string, args: Record<string, unknown> = {}): Promise<ToolResponse> {
    const tool = ctx.registry.get(name);
    if (!tool) throw new Error(`tool ${name} is not registered`);
    return tool.execute(args);
  }

  beforeEach(async () => {
    tmpDir = await makeTmpDir();
    await fs.mkdir(path.join(tmpDir, 'sources.list.d'));
    mainList = path.join(tmpDir, 'sources.list');
    extra = path.join(tmpDir, 'sources.list.d', 'extra.list');
    await fs.writeFile(mainList, `${LINE}\n`);
    await fs.writeFile(extra, `${LINE}\n`);
    clock = new FakeClock();
    probe = new ScriptedProbe(clock, [[]]);
    ctx = buildContext();
  });

  afterEach(async () => {
    await fs.rm(tmpDir, { recursive: true, force: true });
  });

  it('registers every tool once, grouped by module', () => {
    expect(ctx.registry.list('sources').map((t) => t.metadata.name)).toEqual([
      'sources_scan',
      'sources_apply',
      'sources_undo',
      'sources_backups',
      'sources_check_repo',
      'sources_ensure_repo',
    ]);
    expect(ctx.registry.list('lock').map((t) => t.metadata.name)).toEqual(['lock_status', 'lock_wait']);
    expect(() => registerLockTools(ctx)).toThrow('Tool lock_status is already registered');
  });

  it('advertises only the read-only tools as read-only', () => {
    const readOnly = ctx.registry.list().filter((t) => mcpAnnotations(t.metadata).readOnlyHint).map((t) => t.metadata.name);

    expect(readOnly).toEqual(['sources_scan', 'sources_backups', 'sources_check_repo', 'lock_status']);
    expect(metadataOf('lock_wait').riskLevel).toBe('critical');
    expect(mcpAnnotations(metadataOf('lock_wait'))).toEqual({
      readOnlyHint: false,
      destructiveHint: true,
      idempotentHint: false,
      openWorldHint: false,
    });
  });

  describe('sources', () => {
    it('sources_scan reports duplicates across the default file set', async () => {
      expect(await call('sources_scan')).toEqual({
        status: 'success',
        tool: 'sources_scan',
        duration_ms: 0,
        data: {
          report: `2x: ${LINE} -> ${mainList}:1 ${extra}:1`,
          files_scanned: [mainList, extra],
          files_missing: [],
          entries: 2,
          duplicate_groups: 1,
          lines_to_comment: 1,
        },
        summary: '1 duplicated entry found',
      });
    });

    it('rejects invalid arguments before running', async () => {
      expect(await call('sources_scan', { files: [] })).toMatchObject({
        status: 'error',
        error_code: 'INVALID_ARGUMENTS',
        error_category: 'validation',
        duration_ms: 0,
      });
    });

    it('sources_apply dry run changes nothing', async () => {
      expect(await call('sources_apply', { dry_run: true })).toMatchObject({
        status: 'success',
        dry_run: true,
        data: { would_comment: [{ file: extra, lines: [1] }] },
      });
      expect(await fs.readFile(extra, 'utf-8')).toBe(`${LINE}\n`);
    });

    it('sources_apply dry run skips confirmation only when the bypass is enabled', async () => {
      ctx = buildContext(undefined, { confirmation_threshold: 'moderate', dry_run_bypass_confirmation: false });
      expect(await call('sources_apply', { dry_run: true })).toMatchObject({
        status: 'confirmation_required',
        risk_level: 'moderate',
        dry_run_available: true,
      });
      expect(await call('sources_apply', { dry_run: true, confirmed: true })).toMatchObject({ status: 'success', dry_run: true });

      ctx = buildContext(undefined, { confirmation_threshold: 'moderate', dry_run_bypass_confirmation: true });
      expect(await call('sources_apply', { dry_run: true })).toMatchObject({ status: 'success', dry_run: true });
      expect(await call('sources_apply')).toMatchObject({ status: 'confirmation_required' });
      expect(await fs.readFile(extra, 'utf-8')).toBe(`${LINE}\n`);
    });

    it('sources_ensure_repo dry run goes through the confirmation gate', async () => {
      ctx = buildContext(undefined, { confirmation_threshold: 'moderate', dry_run_bypass_confirmation: false });

      expect(await call('sources_ensure_repo', { distro: 'kali', dry_run: true })).toMatchObject({
        status: 'confirmation_required',
        tool: 'sources_ensure_repo',
      });
    });

    it('sources_apply comments duplicates and sources_undo restores them after confirmation', async () => {
      const applied = await call('sources_apply');
      expect(applied).toMatchObject({ status: 'success', data: { rewritten: [extra], commented: 1 } });
      expect(await fs.readFile(extra, 'utf-8')).toBe(`#dedup: ${LINE}\n`);
      const backupId = applied.status === 'success' ? applied.data.backup_id : undefined;
      expect(typeof backupId).toBe('string');

      expect(await call('sources_undo', { backup_id: backupId })).toMatchObject({
        status: 'confirmation_required',
        risk_level: 'high',
        dry_run_available: false,
      });
      expect(await fs.readFile(extra, 'utf-8')).toBe(`#dedup: ${LINE}\n`);

      expect(await call('sources_undo', { backup_id: backupId, confirmed: true })).toMatchObject({
        status: 'success',
        data: { restored: [extra] },
      });
      expect(await fs.readFile(extra, 'utf-8')).toBe(`${LINE}\n`);
    });

    it('sources_undo strips markers from listed files', async () => {
      await call('sources_apply');
      expect(await call('sources_undo', { files: [mainList, extra], confirmed: true })).toMatchObject({
        status: 'success',
        data: { restored: [extra] },
      });
      expect(await fs.readFile(extra, 'utf-8')).toBe(`${LINE}\n`);
    });

    it('sources_undo needs exactly one target', async () => {
      for (const args of [{}, { backup_id: 'x', files: [extra] }]) {
        expect(await call('sources_undo', { ...args, confirmed: true })).toMatchObject({ status: 'error', error_code: 'INVALID_ARGUMENTS' });
      }
    });

    it('sources_undo reports an unknown backup as a restore failure', async () => {
      expect(await call('sources_undo', { backup_id: '2026-01-01T00-00-00-abcdef', confirmed: true })).toMatchObject({
        status: 'error',
        error_code: 'RESTORE_FAILED',
        error_category: 'backup',
      });
    });

    it('sources_undo rejects a backup id that is a path', async () => {
      expect(await call('sources_undo', { backup_id: '../elsewhere', confirmed: true })).toMatchObject({
        status: 'error',
        error_code: 'INVALID_ARGUMENTS',
        message: 'backup_id: not a backup id; use one listed by sources_backups',
      });
    });

    it('sources_backups lists backups taken by apply', async () => {
      await call('sources_apply');
      expect(await call('sources_backups')).toMatchObject({ status: 'success', data: { total: 1, backups: [{ files: [extra] }] } });
    });

    it('sources_check_repo detects the distro from os-release', async () => {
      await fs.writeFile(ctx.osReleasePath, 'ID=kali\nVERSION_CODENAME=kali-rolling\n');

      expect(await call('sources_check_repo')).toMatchObject({
        status: 'success',
        data: {
          distro: { kind: 'kali' },
          repositories: [{ line: 'deb http://http.kali.org/kali kali-rolling main contrib non-free non-free-firmware', present: false, locations: [] }],
        },
        summary: '1 of 1 repository lines missing',
      });
    });

    it('sources_ensure_repo dry run lists the lines it would add', async () => {
      expect(await call('sources_ensure_repo', { distro: 'kali', dry_run: true })).toMatchObject({
        status: 'success',
        dry_run: true,
        data: { target: mainList, would_add: ['deb http://http.kali.org/kali kali-rolling main contrib non-free non-free-firmware'] },
      });
    });

    it('sources_ensure_repo appends to the main list', async () => {
      expect(await call('sources_ensure_repo', { distro: 'ubuntu', codename: 'noble' })).toMatchObject({
        status: 'success',
        data: { target: mainList, added: [expect.stringContaining(' noble '), expect.stringContaining('noble-updates'), expect.stringContaining('noble-security')] },
      });
    });

    it('sources_ensure_repo needs a codename for debian', async () => {
      expect(await call('sources_ensure_repo', { distro: 'debian', dry_run: true })).toMatchObject({
        status: 'error',
        error_code: 'UNSUPPORTED_DISTRO',
        error_category: 'validation',
      });
    });
  });

  describe('lock', () => {
    it('lock_status reports a free lock', async () => {
      expect(await call('lock_status')).toMatchObject({
        status: 'success',
        data: { resource: probe.resource, locked: false, holders: [] },
      });
    });

    it('lock_wait returns blocked with the holders on timeout', async () => {
      probe.answerFromNowOn([HOLDER]);

      const response = await call('lock_wait', { timeout_seconds: 3, poll_interval_seconds: 1 });

      expect(response).toMatchObject({
        status: 'blocked',
        error_code: 'LOCK_TIMEOUT',
        error_category: 'lock',
        holders: [HOLDER],
        duration_ms: 3000,
      });
      expect(response.status === 'blocked' ? response.remediation[1] : undefined).toBe(
        `To terminate the holders, call lock_wait with kill_pids: [${HOLDER}] and confirmed: true`,
      );
      expect(probe.pollTimes).toEqual([0, 1000, 2000]);
    });

    it('lock_wait asks for confirmation before authorizing a kill', async () => {
      probe.answerFromNowOn([HOLDER]);

      expect(await call('lock_wait', { kill_pids: [HOLDER] })).toMatchObject({
        status: 'confirmation_required',
        risk_level: 'critical',
      });
      expect(probe.pollTimes).toEqual([]);
    });

    it('lock_wait terminates approved holders', async () => {
      const signaller = new RecordingSignaller([], () => probe.answerFromNowOn([]));
      ctx = buildContext(signaller);
      probe.answerFromNowOn([HOLDER]);

      expect(await call('lock_wait', { timeout_seconds: 1, poll_interval_seconds: 1, kill_pids: [HOLDER], confirmed: true })).toMatchObject({
        status: 'success',
        data: { state: 'killed', available: true, polls: 2 },
      });
      expect(signaller.sent).toEqual([{ pids: [HOLDER], signal: 'TERM' }]);
    });

    it('lock_wait leaves holders it was not authorized to kill', async () => {
      const signaller = new RecordingSignaller();
      ctx = buildContext(signaller);
      probe.answerFromNowOn([HOLDER]);

      expect(await call('lock_wait', { timeout_seconds: 1, poll_interval_seconds: 1, kill_pids: [999], confirmed: true })).toMatchObject({
        status: 'blocked',
        holders: [HOLDER],
      });
      expect(signaller.sent).toEqual([]);
    });
  });
});

describe('consentFor', () => {
  const request = { resource: '/var/lib/dpkg/lock', holders: [1, 2], waitedMs: 1000 };

  it('approves only when every holder was named', async () => {
    expect(await consentFor([1, 2, 3])(request)).toBe(true);
    expect(await consentFor([1])(request)).toBe(false);
  });

  it('declines without any approved PID', async () => {
    expect(await consentFor(undefined)(request)).toBe(false);
  });
});

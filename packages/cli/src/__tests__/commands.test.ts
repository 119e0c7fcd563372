import { describe, it, expect, beforeAll, afterAll, afterEach, vi } from 'vitest';
import * as fs from 'fs/promises';
import * as path from 'path';
import { tmpdir } from 'os';
import { runParse } from '../commands/parse.js';
import { runRender } from '../commands/render.js';
import { runSynce } from '../commands/synce.js';
import { runProfiles } from '../commands/profiles.js';

const TEST_DIR = path.join(tmpdir(), 'ptpconf-cli-test');
const CONFIG_PATH = path.join(TEST_DIR, 'ptpconf.json');

function testFile(name: string): string {
  return path.join(TEST_DIR, name);
}

describe('CLI commands', () => {
  beforeAll(async () => {
    await fs.mkdir(TEST_DIR, { recursive: true });
    await fs.writeFile(
      CONFIG_PATH,
      JSON.stringify({
        daemon: { ptp4lConfPath: testFile('default.conf') },
        synce: { settings: { 'clockId[ens1f0]': '0x1111' } },
      })
    );
    await fs.writeFile(testFile('default.conf'), '[global]\ndomainNumber 24\n');
    await fs.writeFile(testFile('bc.conf'), '[global]\ndomainNumber 24\n[ens1f0]\nslaveOnly 1\n[ens1f1]\nmasterOnly 1\n');
    await fs.writeFile(testFile('synce.conf'), '[global]\n[<synce1>]\nnetwork_option 2\n[ens1f0]\n[ens1f1]\n');
    await fs.writeFile(testFile('broken.conf'), '[global\n');
  });

  afterAll(async () => {
    await fs.rm(TEST_DIR, { recursive: true, force: true });
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  describe('parse', () => {
    it('テキスト形式でセクションを表示する', async () => {
      const output = await runParse(testFile('bc.conf'), { config: CONFIG_PATH });

      expect(output.split('\n')).toEqual([
        'Clock role: BoundaryClock',
        'Sections:   3',
        '',
        '[global] (plain)',
        '  domainNumber = 24',
        '[ens1f0] (plain)',
        '  slaveOnly = 1',
        '[ens1f1] (plain)',
        '  masterOnly = 1',
      ]);
    });

    it('JSON形式で出力する', async () => {
      const output = await runParse(testFile('bc.conf'), {
        config: CONFIG_PATH,
        format: 'json',
        profile: 'bc',
      });

      const parsed: unknown = JSON.parse(output);
      expect(parsed).toEqual({
        profileName: 'bc',
        clockRole: 'BoundaryClock',
        sections: [
          { kind: 'plain', name: 'global', header: '[global]', options: { domainNumber: '24' } },
          { kind: 'plain', name: 'ens1f0', header: '[ens1f0]', options: { slaveOnly: '1' } },
          { kind: 'plain', name: 'ens1f1', header: '[ens1f1]', options: { masterOnly: '1' } },
        ],
      });
    });

    it('パースエラーはエラーコード付きで投げる', async () => {
      await expect(runParse(testFile('broken.conf'), { config: CONFIG_PATH })).rejects.toMatchObject({
        code: 'MALFORMED_SECTION',
      });
    });

    it('存在しないファイルはエラー', async () => {
      await expect(runParse(testFile('missing.conf'), { config: CONFIG_PATH })).rejects.toThrow(
        `File not found: ${testFile('missing.conf')}`
      );
    });
  });

  describe('render', () => {
    it('設定本文とインターフェース一覧を出力する', async () => {
      const output = await runRender(testFile('bc.conf'), { config: CONFIG_PATH, profile: 'bc' });

      expect(output.split('\n')).toEqual([
        '#profile: bc',
        '',
        '[global]',
        'domainNumber 24',
        '[ens1f0]',
        'slaveOnly 1',
        '[ens1f1]',
        'masterOnly 1',
        '',
        '# Clock role: BoundaryClock',
        '# Interfaces:',
        '#   ens1f0  source=PPS  master=no',
        '#   ens1f1  source=PPS  master=yes',
      ]);
    });
  });

  describe('synce', () => {
    it('設定ファイルの settings でクロックIDを付与する', async () => {
      const output = await runSynce(testFile('synce.conf'), { config: CONFIG_PATH, profile: 's' });

      expect(output.split('\n')).toEqual([
        '#profile: s',
        '',
        '[global]',
        '[<synce1>]',
        'network_option 2',
        'clock_id 0x1111',
        '[ens1f0]',
        '[ens1f1]',
        '',
        '# SyncE devices:',
        '#   synce1',
        '#     Ifaces:          ens1f0, ens1f1',
        '#     Clock ID:        0x1111',
        '#     Network option:  2',
        '#     Extended TLV:    0',
      ]);
    });

    it('--setting は設定ファイルより優先する', async () => {
      const output = await runSynce(testFile('synce.conf'), {
        config: CONFIG_PATH,
        format: 'json',
        setting: ['clockId[ens1f0]=0x2222'],
      });

      const parsed: unknown = JSON.parse(output);
      expect(parsed).toMatchObject({
        devices: [
          {
            name: 'synce1',
            ifaces: ['ens1f0', 'ens1f1'],
            clockId: '0x2222',
            networkOption: 2,
            extendedTlv: 0,
            externalSource: '',
          },
        ],
      });
    });
  });

  describe('profiles', () => {
    it('各プロファイルをレンダリングする', async () => {
      vi.spyOn(console, 'error').mockImplementation(() => {});
      const profilesPath = testFile('profiles.json');
      await fs.writeFile(
        profilesPath,
        JSON.stringify([
          { name: 'gm', interface: 'ens1f0' },
          {
            name: 'synce',
            interface: 'ens1f0',
            ptp4lConf: '[ens1f0]\nslaveOnly 1',
            synce4lConf: '[<synce1>]\n[ens1f0]',
            ptpSettings: { 'clockId[ens1f0]': '0x3333' },
          },
        ])
      );

      const output = await runProfiles(profilesPath, { config: CONFIG_PATH });

      expect(output.split('\n')).toEqual([
        '=== gm (GrandMaster) ===',
        '#profile: gm',
        '',
        '[global]',
        'domainNumber 24',
        '',
        '=== synce (OrdinaryClock) ===',
        '#profile: synce',
        '',
        '[ens1f0]',
        'slaveOnly 1',
        '[global]',
        '',
        '--- synce4l ---',
        '#profile: synce',
        '',
        '[<synce1>]',
        'clock_id 0x3333',
        '[ens1f0]',
        '[global]',
      ]);
    });

    it('空の旧形式は適用しない', async () => {
      vi.spyOn(console, 'error').mockImplementation(() => {});
      const profilesPath = testFile('empty-profile.json');
      await fs.writeFile(profilesPath, '{"name":null,"interface":null}');

      const output = await runProfiles(profilesPath, { config: CONFIG_PATH });

      expect(output).toBe('No profile to apply');
    });
  });
});

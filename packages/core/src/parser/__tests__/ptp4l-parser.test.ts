import { describe, it, expect } from 'vitest';
import { parsePtp4lConf, classifySection, stripSectionName } from '../ptp4l-parser.js';
import { Ptp4lConfError } from '../../errors.js';

function catchConfError(fn: () => unknown): Ptp4lConfError {
  try {
    fn();
  } catch (error) {
    if (error instanceof Ptp4lConfError) {
      return error;
    }
    throw error;
  }
  throw new Error('expected Ptp4lConfError');
}

describe('parsePtp4lConf', () => {
  describe('[global]の補完', () => {
    it('空のテキストは空の[global]だけを持つ', () => {
      const doc = parsePtp4lConf('');

      expect(doc.sections).toHaveLength(1);
      expect(doc.sections[0].header).toBe('[global]');
      expect(doc.sections[0].name).toBe('global');
      expect(doc.sections[0].options.size).toBe(0);
      expect(doc.clockRole).toBe('GrandMaster');
    });

    it('null / undefined も空として扱う', () => {
      expect(parsePtp4lConf(null).sections.map((s) => s.header)).toEqual(['[global]']);
      expect(parsePtp4lConf(undefined).sections.map((s) => s.header)).toEqual(['[global]']);
    });

    it('[global]がなければ末尾に追加する', () => {
      const doc = parsePtp4lConf('[ens1f0]\nmasterOnly 1');

      expect(doc.sections.map((s) => s.header)).toEqual(['[ens1f0]', '[global]']);
    });

    it('[global]があれば追加しない', () => {
      const doc = parsePtp4lConf('[ens1f0]\n[global]\ndomainNumber 24');

      expect(doc.sections.map((s) => s.header)).toEqual(['[ens1f0]', '[global]']);
      expect(doc.sections[1].options.get('domainNumber')).toBe('24');
    });
  });

  describe('オプション行', () => {
    it('最初の空白でkeyとvalueに分割する', () => {
      const doc = parsePtp4lConf('[global]\ndomainNumber 24\nlogging_level 6');

      expect([...doc.sections[0].options]).toEqual([
        ['domainNumber', '24'],
        ['logging_level', '6'],
      ]);
    });

    it('valueは最初の空白以降をそのまま保持する', () => {
      const doc = parsePtp4lConf('[global]\nmessage_tag  two  words');

      expect(doc.sections[0].options.get('message_tag')).toBe(' two  words');
    });

    it('前後の空白は取り除く', () => {
      const doc = parsePtp4lConf('   [global]  \n\t  domainNumber 24  \r');

      expect(doc.sections[0].header).toBe('[global]');
      expect(doc.sections[0].options.get('domainNumber')).toBe('24');
    });

    it('空白のない行は無視する', () => {
      const doc = parsePtp4lConf('[global]\nnovalue\ndomainNumber 24');

      expect([...doc.sections[0].options.keys()]).toEqual(['domainNumber']);
    });

    it('コメント行と空行は無視する', () => {
      const doc = parsePtp4lConf('# header comment\n\n[global]\n# domainNumber 0\n\ndomainNumber 24\n');

      expect(doc.sections).toHaveLength(1);
      expect([...doc.sections[0].options]).toEqual([['domainNumber', '24']]);
    });

    it('同じkeyは最初の位置のまま後の値で上書きする', () => {
      const doc = parsePtp4lConf('[global]\na 1\nb 2\na 3');

      expect([...doc.sections[0].options]).toEqual([
        ['a', '3'],
        ['b', '2'],
      ]);
    });
  });

  describe('セクションの種類', () => {
    it('デバイス・外部ソース・通常セクションを判別する', () => {
      const doc = parsePtp4lConf('[<synce1>]\n[{gnss}]\n[ens1f0]');

      expect(doc.sections.map((s) => [s.kind, s.name, s.header])).toEqual([
        ['device', 'synce1', '[<synce1>]'],
        ['externalSource', 'gnss', '[{gnss}]'],
        ['plain', 'ens1f0', '[ens1f0]'],
        ['plain', 'global', '[global]'],
      ]);
    });

    it('最初の ] より後ろはヘッダに含めない', () => {
      const doc = parsePtp4lConf('[ens1f0] trailing text\nmasterOnly 1');

      expect(doc.sections[0].header).toBe('[ens1f0]');
      expect(doc.sections[0].options.get('masterOnly')).toBe('1');
    });

    it('classifySection / stripSectionName', () => {
      expect(classifySection('[< synce1 >]')).toBe('device');
      expect(classifySection('[{ext}]')).toBe('externalSource');
      expect(classifySection('[eth0]')).toBe('plain');
      expect(stripSectionName('[< synce1 >]')).toBe('synce1');
      expect(stripSectionName('[{ext}]')).toBe('ext');
    });
  });

  describe('エラー', () => {
    it('] のないセクションはMALFORMED_SECTION', () => {
      const error = catchConfError(() => parsePtp4lConf('[global\ndomainNumber 24'));

      expect(error.code).toBe('MALFORMED_SECTION');
      expect(error.line).toBe('[global');
      expect(error.message).toBe("Section missing closing ']': [global");
    });

    it('セクション前のオプションはOPTION_OUTSIDE_SECTION', () => {
      const error = catchConfError(() => parsePtp4lConf('domainNumber 24\n[global]'));

      expect(error.code).toBe('OPTION_OUTSIDE_SECTION');
      expect(error.message).toBe('Config option not in section: domainNumber 24');
    });
  });

  describe('clockRole', () => {
    it('スレーブ指定のないインターフェースはGrandMaster', () => {
      const doc = parsePtp4lConf('[ens1f0]\nmasterOnly 1\n[ens1f1]\nmasterOnly 1');

      expect(doc.clockRole).toBe('GrandMaster');
    });

    it('スレーブポート1つだけならOrdinaryClock', () => {
      const doc = parsePtp4lConf('[ens1f0]\nslaveOnly 1');

      expect(doc.clockRole).toBe('OrdinaryClock');
    });

    it('スレーブを含む複数ポートならBoundaryClock', () => {
      const doc = parsePtp4lConf('[ens1f0]\nslaveOnly 1\n[ens1f1]\nclientOnly 1');

      expect(doc.clockRole).toBe('BoundaryClock');
    });

    it.each([
      ['masterOnly 0'],
      ['serverOnly 0'],
      ['slaveOnly 1'],
      ['clientOnly 1'],
    ])('%s はスレーブ指定として扱う', (line) => {
      const doc = parsePtp4lConf(`[global]\n[ens1f0]\n${line}`);

      expect(doc.clockRole).toBe('OrdinaryClock');
    });

    it('逆の値はスレーブ指定ではない', () => {
      const doc = parsePtp4lConf('[global]\n[ens1f0]\nslaveOnly 0\nmasterOnly 1');

      expect(doc.clockRole).toBe('GrandMaster');
    });
  });

  it('profileNameを保持する', () => {
    expect(parsePtp4lConf('', { profileName: 'bc-profile' }).profileName).toBe('bc-profile');
    expect(parsePtp4lConf('').profileName).toBe('');
  });
});

import { EventEmitter } from 'events';
import { readFile, stat } from 'fs/promises';
import type { ClockRole, Iface, PtpProfile } from '@ptpconf/types';
import { parsePtp4lConf } from '../parser/ptp4l-parser.js';
import { loadNodeProfiles } from '../profile/profile-loader.js';
import { renderPtp4lConf } from '../renderer/ptp4l-renderer.js';
import { renderSynce4lConf } from '../renderer/synce-renderer.js';
import type { SynceRelations } from '../synce/relations.js';

export interface RenderedProfile {
  profileName: string;
  clockRole: ClockRole;
  text: string;
  ifaces: Iface[];
  mapping: string[];
}

export interface RenderedSynceProfile {
  profileName: string;
  text: string;
  relations: SynceRelations;
}

export interface PtpConfUpdateEvents {
  update: [profiles: PtpProfile[]];
}

/**
 * ノードプロファイルの更新を管理
 *
 * 同じJSONの再適用は無視し、新しいプロファイルを読み込んだら 'update' を発行する。
 * レンダリングは呼び出し側が 'update' を受けて直列に行う。
 * ログは標準出力を汚さないよう stderr に出す。
 */
export class PtpConfUpdate extends EventEmitter<PtpConfUpdateEvents> {
  private appliedNodeProfileJson: string | null = null;
  private nodeProfiles: PtpProfile[] = [];

  constructor(private readonly defaultPtp4lConfig: string) {
    super();
  }

  /**
   * デフォルトのptp4l設定ファイルを読み込んで作成
   * ファイルがない・読めない場合はエラー
   */
  static async create(ptp4lConfPath: string): Promise<PtpConfUpdate> {
    try {
      await stat(ptp4lConfPath);
    } catch (error) {
      if ((error as NodeJS.ErrnoException).code === 'ENOENT') {
        throw new Error(`ptp4l config file doesn't exist: ${ptp4lConfPath}`);
      }
      throw new Error(`unknown error searching for the ${ptp4lConfPath} file: ${(error as Error).message}`);
    }

    try {
      const content = await readFile(ptp4lConfPath, 'utf-8');
      return new PtpConfUpdate(content);
    } catch (error) {
      throw new Error(`failed to read ${ptp4lConfPath}: ${(error as Error).message}`);
    }
  }

  get profiles(): readonly PtpProfile[] {
    return this.nodeProfiles;
  }

  get defaultConfig(): string {
    return this.defaultPtp4lConfig;
  }

  /**
   * プロファイルJSONを適用
   * @returns 新しいプロファイルを読み込んだら true
   * @throws どちらの形式としても読めない場合
   */
  updateConfig(nodeProfilesJson: string): boolean {
    if (this.appliedNodeProfileJson === nodeProfilesJson) {
      return false;
    }

    const loaded = loadNodeProfiles(nodeProfilesJson);
    if (!loaded) {
      throw new Error('unable to load profile config');
    }

    if (loaded.format === 'legacy') {
      // 空の旧形式 '{"name":null,"interface":null}' はスキップ
      const [profile] = loaded.profiles;
      if (profile.name == null || profile.interface == null) {
        console.error('[PtpConfUpdate] Skip no profile');
        return false;
      }
      console.error('[PtpConfUpdate] load profiles using old method');
    } else {
      console.error('[PtpConfUpdate] load profiles');
    }

    this.appliedNodeProfileJson = nodeProfilesJson;
    this.nodeProfiles = loaded.profiles;
    this.emit('update', loaded.profiles);

    return true;
  }

  /**
   * プロファイルのptp4l設定をレンダリング
   * ptp4lConf が未指定ならデフォルト設定を使う
   */
  renderProfile(profile: PtpProfile): RenderedProfile {
    const profileName = profile.name ?? '';
    const document = parsePtp4lConf(profile.ptp4lConf ?? this.defaultPtp4lConfig, { profileName });
    const rendered = renderPtp4lConf(document);

    return { profileName, clockRole: document.clockRole, ...rendered };
  }

  /**
   * プロファイルのsynce4l設定をレンダリング
   * @returns synce4lConf がなければ null
   */
  renderSynceProfile(profile: PtpProfile): RenderedSynceProfile | null {
    if (!profile.synce4lConf) {
      return null;
    }

    const profileName = profile.name ?? '';
    const document = parsePtp4lConf(profile.synce4lConf, { profileName });
    const rendered = renderSynce4lConf(document, profile.ptpSettings ?? {});

    return { profileName, ...rendered };
  }
}

import Database from 'better-sqlite3';
import { BaseDao } from './BaseDao';
import { ApprovedRow, ProfileRecord, ScreeningVerdict } from '../../types';
import { isPlatform } from '../../utils/identity';

interface ApprovedDbRow {
  id: number;
  key: string;
  approvedAt: string;
  approvedDate: string;
  name: string;
  username: string;
  platform: string;
  followers: number;
  engagementRate: number;
  profileUrl: string;
  bio: string;
  ageOk: number;
  targetBodyType: number;
  targetClass: number;
  targetNationality: number;
  isRealPerson: number;
  confidence: number;
  reason: string;
  sourceTag: string;
}

export interface ApprovedInsert {
  key: string;
  profile: ProfileRecord;
  verdict: ScreeningVerdict;
  approvedAt: string;
  approvedDate: string;
}

/**
 * 通过名单 DAO，只追加不修改
 */
export class ApprovedProfileDao extends BaseDao {
  private readonly baseSelect = `
    SELECT
      id,
      key,
      approved_at AS approvedAt,
      approved_date AS approvedDate,
      name,
      username,
      platform,
      followers,
      engagement_rate AS engagementRate,
      profile_url AS profileUrl,
      bio,
      age_ok AS ageOk,
      target_body_type AS targetBodyType,
      target_class AS targetClass,
      target_nationality AS targetNationality,
      is_real_person AS isRealPerson,
      confidence,
      reason,
      source_tag AS sourceTag
    FROM approved_profiles
  `;

  constructor(db: Database.Database) {
    super(db);
  }

  insert(data: ApprovedInsert): boolean {
    const { profile, verdict } = data;
    const result = this.db
      .prepare(
        `INSERT INTO approved_profiles (
          key, approved_at, approved_date, name, username, platform, followers, engagement_rate,
          profile_url, bio, age_ok, target_body_type, target_class, target_nationality,
          is_real_person, confidence, reason, source_tag
        ) VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?)
        ON CONFLICT(key) DO NOTHING`
      )
      .run(
        data.key,
        data.approvedAt,
        data.approvedDate,
        profile.displayName || profile.username,
        profile.username,
        profile.platform,
        profile.followerCount,
        profile.engagementRate,
        profile.profileUrl,
        profile.bio,
        this.toFlag(verdict.ageOk),
        this.toFlag(verdict.targetBodyType),
        this.toFlag(verdict.targetClass),
        this.toFlag(verdict.targetNationality),
        this.toFlag(verdict.isRealPerson),
        verdict.confidence,
        verdict.reason,
        profile.sourceTag
      );
    return result.changes > 0;
  }

  countByDate(date: string): number {
    const row = this.db
      .prepare<[string], { count: number }>(
        'SELECT COUNT(*) AS count FROM approved_profiles WHERE approved_date = ?'
      )
      .get(date);
    return row?.count ?? 0;
  }

  findByDate(date: string): ApprovedRow[] {
    const rows = this.db
      .prepare<[string], ApprovedDbRow>(`${this.baseSelect} WHERE approved_date = ? ORDER BY id ASC`)
      .all(date);
    return rows.flatMap((row) => {
      const mapped = this.toApprovedRow(row);
      return mapped ? [mapped] : [];
    });
  }

  count(): number {
    const row = this.db
      .prepare<[], { count: number }>('SELECT COUNT(*) AS count FROM approved_profiles')
      .get();
    return row?.count ?? 0;
  }

  private toApprovedRow(row: ApprovedDbRow): ApprovedRow | undefined {
    if (!isPlatform(row.platform)) {
      return undefined;
    }
    return {
      id: row.id,
      key: row.key,
      approvedAt: row.approvedAt,
      approvedDate: row.approvedDate,
      name: row.name,
      username: row.username,
      platform: row.platform,
      followers: row.followers,
      engagementRate: row.engagementRate,
      profileUrl: row.profileUrl,
      bio: row.bio,
      ageOk: this.fromFlag(row.ageOk),
      targetBodyType: this.fromFlag(row.targetBodyType),
      targetClass: this.fromFlag(row.targetClass),
      targetNationality: this.fromFlag(row.targetNationality),
      isRealPerson: this.fromFlag(row.isRealPerson),
      confidence: row.confidence,
      reason: row.reason,
      sourceTag: row.sourceTag,
    };
  }
}

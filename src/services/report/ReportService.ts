import fs from 'fs';
import path from 'path';
import { HistoryLedger } from '../ledger/HistoryLedger';
import { ApprovedRow, ReportFormat } from '../../types';
import { logger } from '../../utils/logger';
import { toLocalDate } from '../../utils/time';

export const REPORT_FORMATS: readonly ReportFormat[] = ['json', 'csv', 'markdown'];

const EXTENSIONS: Record<ReportFormat, string> = {
  json: 'json',
  csv: 'csv',
  markdown: 'md',
};

const CSV_COLUMNS: Array<[string, (row: ApprovedRow) => string | number | boolean]> = [
  ['approved_at', (row) => row.approvedAt],
  ['name', (row) => row.name],
  ['username', (row) => row.username],
  ['platform', (row) => row.platform],
  ['followers', (row) => row.followers],
  ['engagement_rate', (row) => row.engagementRate],
  ['profile_url', (row) => row.profileUrl],
  ['bio', (row) => row.bio],
  ['age_ok', (row) => row.ageOk],
  ['target_body_type', (row) => row.targetBodyType],
  ['target_class', (row) => row.targetClass],
  ['target_nationality', (row) => row.targetNationality],
  ['is_real_person', (row) => row.isRealPerson],
  ['confidence', (row) => row.confidence],
  ['reason', (row) => row.reason],
  ['source_tag', (row) => row.sourceTag],
];

/**
 * RFC 4180：含逗号、引号或换行的字段加双引号，内部引号加倍
 */
export const escapeCsv = (value: string | number | boolean): string => {
  const text = String(value);
  return /[",\r\n]/.test(text) ? `"${text.replace(/"/g, '""')}"` : text;
};

const escapeMarkdownCell = (value: string): string => value.replace(/\|/g, '\\|').replace(/\r?\n/g, ' ');

export const isReportFormat = (value: string): value is ReportFormat =>
  (REPORT_FORMATS as readonly string[]).includes(value);

/**
 * 每日通过名单导出
 */
export class ReportService {
  constructor(
    private readonly ledger: HistoryLedger,
    private readonly outputDir: string,
    private readonly clock: () => Date = () => new Date()
  ) {}

  render(format: ReportFormat, date: string): string {
    const rows = this.ledger.getApprovedByDate(date);
    switch (format) {
      case 'json':
        return this.renderJson(rows, date);
      case 'csv':
        return this.renderCsv(rows);
      case 'markdown':
        return this.renderMarkdown(rows, date);
    }
  }

  /**
   * 写入 prospects_<date>.<ext>，返回文件路径
   */
  write(format: ReportFormat, date: string = toLocalDate(this.clock())): string {
    if (!fs.existsSync(this.outputDir)) {
      fs.mkdirSync(this.outputDir, { recursive: true });
    }
    const filePath = path.join(this.outputDir, `prospects_${date}.${EXTENSIONS[format]}`);
    fs.writeFileSync(filePath, this.render(format, date), 'utf-8');
    logger.info(`报告已生成: ${filePath}`);
    return filePath;
  }

  writeAll(date: string = toLocalDate(this.clock())): string[] {
    return REPORT_FORMATS.map((format) => this.write(format, date));
  }

  private renderJson(rows: ApprovedRow[], date: string): string {
    return JSON.stringify(
      {
        date,
        generatedAt: this.clock().toISOString(),
        total: rows.length,
        prospects: rows,
      },
      null,
      2
    );
  }

  private renderCsv(rows: ApprovedRow[]): string {
    const lines = [CSV_COLUMNS.map(([name]) => name).join(',')];
    for (const row of rows) {
      lines.push(CSV_COLUMNS.map(([, pick]) => escapeCsv(pick(row))).join(','));
    }
    return `${lines.join('\r\n')}\r\n`;
  }

  private renderMarkdown(rows: ApprovedRow[], date: string): string {
    const byPlatform = new Map<string, number>();
    for (const row of rows) {
      byPlatform.set(row.platform, (byPlatform.get(row.platform) ?? 0) + 1);
    }

    const lines = [
      `# 每日合作账号名单 - ${date}`,
      '',
      `共 ${rows.length} 个账号`,
      ...[...byPlatform.entries()].map(([platform, count]) => `- ${platform}: ${count}`),
      '',
    ];

    if (rows.length === 0) {
      lines.push('当日没有通过筛选的账号。', '');
      return lines.join('\n');
    }

    lines.push(
      '| # | 名称 | 平台 | 用户名 | 粉丝 | 互动率 | 置信度 | 理由 |',
      '|---|------|------|--------|------|--------|--------|------|'
    );
    rows.forEach((row, index) => {
      lines.push(
        `| ${index + 1} | ${escapeMarkdownCell(row.name)} | ${row.platform} | ` +
          `[@${escapeMarkdownCell(row.username)}](${row.profileUrl}) | ${row.followers} | ` +
          `${row.engagementRate.toFixed(2)}% | ${row.confidence}% | ${escapeMarkdownCell(row.reason)} |`
      );
    });
    lines.push('');
    return lines.join('\n');
  }
}

import { z } from 'zod';
import { ScreeningVerdict } from '../../types';

const TRUTHY = new Set(['true', 'yes', 'sim', 'y', '1']);

const flag = z
  .unknown()
  .transform((value) => value === true || (typeof value === 'string' && TRUTHY.has(value.trim().toLowerCase())));

const text = z.unknown().transform((value) => (typeof value === 'string' ? value.trim() : ''));

const confidence = z.unknown().transform((value) => {
  const numeric = typeof value === 'number' ? value : typeof value === 'string' ? Number(value) : NaN;
  if (!Number.isFinite(numeric)) {
    return 0;
  }
  return Math.min(Math.max(Math.round(numeric), 0), 100);
});

const verdictPayloadSchema = z.object({
  age_ok: flag,
  target_body_type: flag,
  target_class: flag,
  target_nationality: flag,
  is_real_person: flag,
  approved: flag,
  reason: text,
  confidence,
});

const tryParse = (candidate: string): unknown => {
  try {
    return JSON.parse(candidate);
  } catch {
    return undefined;
  }
};

/**
 * 从模型输出中取出 JSON 对象
 * 依次尝试：整段、```json 代码块、正文中第一个 { 到最后一个 }
 */
export const extractJsonObject = (output: string): unknown => {
  const trimmed = output.trim();
  const candidates = [trimmed];

  const fenced = /```(?:json)?\s*([\s\S]*?)```/i.exec(trimmed);
  if (fenced?.[1]) {
    candidates.push(fenced[1].trim());
  }

  const start = trimmed.indexOf('{');
  const end = trimmed.lastIndexOf('}');
  if (start >= 0 && end > start) {
    candidates.push(trimmed.slice(start, end + 1));
  }

  for (const candidate of candidates) {
    const parsed = tryParse(candidate);
    if (parsed !== undefined) {
      return parsed;
    }
  }
  return undefined;
};

export const malformedVerdict = (reason: string, raw: string): ScreeningVerdict => ({
  ageOk: false,
  targetBodyType: false,
  targetClass: false,
  targetNationality: false,
  isRealPerson: false,
  approved: false,
  reason,
  confidence: 0,
  raw,
});

/**
 * 解析模型返回的筛选结论
 * 缺失字段按 false / 0 / "" 处理；approved 必须同时满足模型结论和五项条件
 */
export const parseVerdict = (output: string): ScreeningVerdict => {
  const payload = extractJsonObject(output);
  const parsed = verdictPayloadSchema.safeParse(payload);
  if (!parsed.success) {
    return malformedVerdict(`无法解析模型输出: ${output.trim().slice(0, 100)}`, output);
  }

  const data = parsed.data;
  const criteria = {
    ageOk: data.age_ok,
    targetBodyType: data.target_body_type,
    targetClass: data.target_class,
    targetNationality: data.target_nationality,
    isRealPerson: data.is_real_person,
  };
  const allCriteria = Object.values(criteria).every(Boolean);

  return {
    ...criteria,
    approved: data.approved && allCriteria,
    reason: data.reason,
    confidence: data.confidence,
    raw: output,
  };
};

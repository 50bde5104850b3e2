import { extractJsonObject, parseVerdict } from './verdictParser';

const body = {
  age_ok: true,
  target_body_type: true,
  target_class: true,
  target_nationality: true,
  is_real_person: true,
  approved: true,
  reason: 'criadora brasileira, conteúdo de estilo de vida',
  confidence: 82,
};

describe('verdictParser', () => {
  test('代码块包裹的 JSON 与裸 JSON 解析结果一致', () => {
    const bare = JSON.stringify(body);
    const fenced = '```json\n' + bare + '\n```';

    const fromBare = parseVerdict(bare);
    const fromFenced = parseVerdict(fenced);

    expect({ ...fromFenced, raw: '' }).toEqual({ ...fromBare, raw: '' });
    expect(fromBare).toMatchObject({ approved: true, confidence: 82, reason: body.reason });
  });

  test('可以从说明文字中提取 JSON', () => {
    const verdict = parseVerdict(`Aqui está a análise: ${JSON.stringify(body)} Obrigado!`);
    expect(verdict.approved).toBe(true);
  });

  test('任一条件为 false 时即使模型判定通过也不通过', () => {
    const verdict = parseVerdict(JSON.stringify({ ...body, target_class: false }));
    expect(verdict.approved).toBe(false);
    expect(verdict.targetClass).toBe(false);
    expect(verdict.confidence).toBe(82);
  });

  test('五项条件都满足但模型判定不通过时不通过', () => {
    expect(parseVerdict(JSON.stringify({ ...body, approved: false })).approved).toBe(false);
  });

  test('缺失字段按默认值处理', () => {
    expect(parseVerdict('{"age_ok": true}')).toEqual({
      ageOk: true,
      targetBodyType: false,
      targetClass: false,
      targetNationality: false,
      isRealPerson: false,
      approved: false,
      reason: '',
      confidence: 0,
      raw: '{"age_ok": true}',
    });
  });

  test('置信度限制在 0-100 并取整', () => {
    expect(parseVerdict(JSON.stringify({ ...body, confidence: 140 })).confidence).toBe(100);
    expect(parseVerdict(JSON.stringify({ ...body, confidence: -3 })).confidence).toBe(0);
    expect(parseVerdict(JSON.stringify({ ...body, confidence: '67.6' })).confidence).toBe(68);
  });

  test('无法解析时返回置信度为 0 的拒绝结论', () => {
    const verdict = parseVerdict('Sorry, I cannot help with that.');
    expect(verdict).toMatchObject({
      approved: false,
      confidence: 0,
      reason: '无法解析模型输出: Sorry, I cannot help with that.',
      raw: 'Sorry, I cannot help with that.',
    });
  });

  test('JSON 数组不是有效结论', () => {
    expect(parseVerdict('[1, 2]').approved).toBe(false);
    expect(parseVerdict('[1, 2]').reason).toBe('无法解析模型输出: [1, 2]');
  });

  test('extractJsonObject 对空文本返回 undefined', () => {
    expect(extractJsonObject('   ')).toBeUndefined();
  });
});

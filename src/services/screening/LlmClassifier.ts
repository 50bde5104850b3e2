import { z } from 'zod';
import { ScreeningConfig } from '../../config';
import { ProfileRecord, ScreeningVerdict } from '../../types';
import { fetchJson } from '../../utils/http';
import { CollaboratorError, ScreeningUnavailableError } from '../../utils/errors';
import { SYSTEM_PROMPT, buildScreeningPrompt } from './prompt';
import { parseVerdict } from './verdictParser';

const chatCompletionSchema = z.object({
  choices: z
    .array(
      z.object({
        message: z.object({ content: z.string().nullable().optional() }),
      })
    )
    .default([]),
});

/**
 * 单个账号的分类接口
 * 传输失败抛 CollaboratorError；服务整体不可用抛 ScreeningUnavailableError
 */
export interface ProfileClassifier {
  classify(profile: ProfileRecord): Promise<ScreeningVerdict>;
}

/**
 * 兼容 OpenAI chat completions 的大模型分类器
 */
export class LlmClassifier implements ProfileClassifier {
  constructor(private readonly cfg: ScreeningConfig) {}

  async classify(profile: ProfileRecord): Promise<ScreeningVerdict> {
    if (!this.cfg.apiKey) {
      throw new ScreeningUnavailableError('缺少 OPENAI_API_KEY，无法进行筛选');
    }

    let response: z.infer<typeof chatCompletionSchema> | null;
    try {
      response = await fetchJson(`${this.cfg.apiBase.replace(/\/+$/, '')}/chat/completions`, chatCompletionSchema, {
        collaborator: 'llm',
        timeoutMs: this.cfg.requestTimeoutMs,
        method: 'POST',
        headers: { Authorization: `Bearer ${this.cfg.apiKey}` },
        body: {
          model: this.cfg.model,
          messages: [
            { role: 'system', content: SYSTEM_PROMPT },
            { role: 'user', content: buildScreeningPrompt(profile, this.cfg.criteria) },
          ],
          max_tokens: this.cfg.maxTokens,
          temperature: this.cfg.temperature,
        },
      });
    } catch (error) {
      if (error instanceof CollaboratorError && (error.status === 401 || error.status === 403)) {
        throw new ScreeningUnavailableError(`大模型接口拒绝访问(${error.status})，请检查 OPENAI_API_KEY`);
      }
      throw error;
    }

    if (!response) {
      throw new CollaboratorError('llm', '接口地址不存在(404)', 404);
    }

    return parseVerdict(response.choices[0]?.message.content ?? '');
  }
}

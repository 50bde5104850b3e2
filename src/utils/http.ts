import { z } from 'zod';
import { CollaboratorError } from './errors';

export interface FetchJsonOptions {
  collaborator: string;
  timeoutMs: number;
  method?: 'GET' | 'POST';
  headers?: Record<string, string>;
  body?: unknown;
}

const readErrorBody = async (resp: Response): Promise<unknown> => {
  const text = await resp.text();
  try {
    return JSON.parse(text);
  } catch {
    return text;
  }
};

/**
 * 带超时的 JSON 请求，返回值按 schema 校验
 * 404 视为"不存在"返回 null，其余非 2xx 抛 CollaboratorError
 */
export const fetchJson = async <S extends z.ZodTypeAny>(
  url: string,
  schema: S,
  options: FetchJsonOptions
): Promise<z.infer<S> | null> => {
  const controller = new AbortController();
  const timer = setTimeout(() => controller.abort(), options.timeoutMs);

  try {
    const resp = await fetch(url, {
      method: options.method ?? 'GET',
      headers: {
        Accept: 'application/json',
        ...(options.body !== undefined ? { 'Content-Type': 'application/json' } : {}),
        ...options.headers,
      },
      body: options.body !== undefined ? JSON.stringify(options.body) : undefined,
      signal: controller.signal,
    });

    if (resp.status === 404) {
      return null;
    }
    if (!resp.ok) {
      throw new CollaboratorError(
        options.collaborator,
        `请求失败(${resp.status})`,
        resp.status,
        await readErrorBody(resp)
      );
    }

    const payload: unknown = await resp.json();
    const parsed = schema.safeParse(payload);
    if (!parsed.success) {
      throw new CollaboratorError(
        options.collaborator,
        `返回结构无效: ${parsed.error.issues[0]?.message ?? 'unknown'}`
      );
    }
    return parsed.data;
  } catch (error) {
    if (error instanceof CollaboratorError) {
      throw error;
    }
    if (controller.signal.aborted) {
      throw new CollaboratorError(options.collaborator, `请求超时(${options.timeoutMs}ms)`);
    }
    throw new CollaboratorError(
      options.collaborator,
      error instanceof Error ? error.message : '请求失败'
    );
  } finally {
    clearTimeout(timer);
  }
};

import { PLATFORMS, Platform, ProfileIdentity } from '../types';

/**
 * 台账全局唯一键：platform:小写用户名
 */
export const identityKey = (identity: ProfileIdentity): string =>
  `${identity.platform}:${identity.username.trim().toLowerCase()}`;

export const isPlatform = (value: unknown): value is Platform =>
  typeof value === 'string' && (PLATFORMS as readonly string[]).includes(value);

/**
 * 去掉 @ 前缀和首尾空白
 */
export const normalizeUsername = (username: string): string => username.trim().replace(/^@+/, '');

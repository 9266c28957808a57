import { ConfigService } from '@nestjs/config';

/** 필수 환경변수를 가져오되, 없으면 에러 발생 */
export function getRequiredEnvStr(config: ConfigService, key: string): string {
  const value = config.get<string>(key);
  if (!value) throw new Error(`Missing required environment variable: ${key}`);
  return value;
}

export function getRequiredEnvNumber(
  config: ConfigService,
  key: string,
): number {
  const value = Number(getRequiredEnvStr(config, key));
  if (!Number.isFinite(value)) {
    throw new Error(`Environment variable ${key} is not a number`);
  }
  return value;
}

/** 값이 없으면 기본값 사용 */
export function getEnvNumber(
  config: ConfigService,
  key: string,
  fallback: number,
): number {
  const raw = config.get<string | number>(key);
  if (raw === undefined || raw === '') return fallback;
  const value = Number(raw);
  if (!Number.isFinite(value)) {
    throw new Error(`Environment variable ${key} is not a number`);
  }
  return value;
}

export const clampLimit = (
  rawValue: unknown,
  options: { min?: number; max?: number; defaultValue: number }
): number => {
  const { min = 1, max, defaultValue } = options;
  const parsed = parseInt(String(rawValue), 10);
  const value = Number.isFinite(parsed) ? parsed : defaultValue;
  const clampedMin = Math.max(value, min);
  if (max !== undefined) {
    return Math.min(clampedMin, max);
  }
  return clampedMin;
};

/**
 * 解析非負的浮點門檻值；未提供時回傳預設值，格式錯誤回傳 null
 */
export const parseThreshold = (rawValue: unknown, defaultValue: number): number | null => {
  if (rawValue === undefined || rawValue === '') return defaultValue;
  if (typeof rawValue !== 'string' && typeof rawValue !== 'number') return null;
  const parsed = Number(rawValue);
  if (!Number.isFinite(parsed) || parsed < 0) return null;
  return parsed;
};

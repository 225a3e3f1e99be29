/**
 * 解析 JSON，文本不是合法 JSON 时返回 undefined
 */
export function parseJson(text: string): unknown {
  try {
    return JSON.parse(text);
  } catch {
    return undefined;
  }
}

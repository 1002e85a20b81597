/** Decode as UTF-8 and drop a leading byte order mark. */
export function toText(data: string | Buffer): string {
  const content = typeof data === 'string' ? data : data.toString('utf-8');
  return content.charCodeAt(0) === 0xfeff ? content.slice(1) : content;
}

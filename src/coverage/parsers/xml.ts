/**
 * Attribute map of the first element named `tag` at or after `from`.
 * Coverage summaries only need root-level attributes, so this stays a scan
 * rather than a full XML parse.
 */
export function findElementAttributes(xml: string, tag: string, from = 0): Record<string, string> | null {
  const re = new RegExp(`<${tag}\\b([^>]*?)/?>`, 'g');
  re.lastIndex = from;
  const m = re.exec(xml);
  return m ? parseAttributes(m[1] ?? '') : null;
}

export function allElementAttributes(xml: string, tag: string, from = 0): Array<Record<string, string>> {
  const re = new RegExp(`<${tag}\\b([^>]*?)/?>`, 'g');
  re.lastIndex = from;
  const out: Array<Record<string, string>> = [];
  for (let m = re.exec(xml); m; m = re.exec(xml)) out.push(parseAttributes(m[1] ?? ''));
  return out;
}

export function parseAttributes(body: string): Record<string, string> {
  const out: Record<string, string> = {};
  for (const m of body.matchAll(/([\w:.-]+)\s*=\s*(?:"([^"]*)"|'([^']*)')/g)) {
    out[m[1]] = m[2] ?? m[3] ?? '';
  }
  return out;
}

export function intAttr(attrs: Record<string, string>, name: string): number | null {
  const raw = attrs[name];
  if (raw === undefined) return null;
  const n = Number.parseInt(raw, 10);
  return Number.isNaN(n) ? null : n;
}

export type PortType = 'hdmi' | 'dp';

export type Port = {
  id: string;
  type: PortType;
  name: string;
};

const KNOWN_PREFIXES = new Map<string, PortType>([
  ['hdmi', 'hdmi'],
  ['dp', 'dp'],
  ['displayport', 'dp']
]);

export type NormalizePortOptions = {
  defaultType?: PortType;
};

export function normalizePortId(value: string | null | undefined, options?: NormalizePortOptions): string {
  const trimmed = typeof value === 'string' ? value.trim() : '';
  if (!trimmed) {
    return '';
  }

  const match = /^([a-z0-9_-]+):(.+)$/i.exec(trimmed);
  if (match) {
    const [, rawPrefix, remainder] = match;
    const known = KNOWN_PREFIXES.get(rawPrefix.toLowerCase());
    return `${known ?? rawPrefix}:${remainder}`;
  }

  return `${options?.defaultType ?? 'hdmi'}:${trimmed}`;
}

export function parsePortId(value: string | null | undefined, options?: NormalizePortOptions): Port | null {
  const normalized = normalizePortId(value, options);
  const separator = normalized.indexOf(':');
  if (separator <= 0) {
    return null;
  }
  const type = KNOWN_PREFIXES.get(normalized.slice(0, separator));
  const name = normalized.slice(separator + 1);
  if (!type || !name) {
    return null;
  }
  return { id: `${type}:${name}`, type, name };
}


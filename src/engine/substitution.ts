import { ConfigError } from './errors';

export type Variables = Readonly<Record<string, string>>;

const PLACEHOLDER = /\$\$\{|\$\{([^}]*)\}/g;
const NAME = /^[A-Za-z_][A-Za-z0-9_]*/;

/**
 * Replace ${NAME} placeholders in text.
 *
 * Supported forms: ${NAME}, ${NAME//from/to}, ${NAME/from/to},
 * ${NAME:-default}, ${NAME^^}, ${NAME,,}. "$${" is kept as a literal "${".
 * Throws ConfigError for names missing from variables (unless a default is
 * given) and for operators it does not know.
 */
export function substitute(text: string, variables: Variables, path?: string): string {
  return text.replace(PLACEHOLDER, (match: string, body: string | undefined) => {
    if (body === undefined) return '${';

    const nameMatch = NAME.exec(body);
    if (!nameMatch) {
      throw new ConfigError(`Malformed placeholder '${match}'`, path);
    }
    const name = nameMatch[0];
    const op = body.slice(name.length);
    const value = Object.prototype.hasOwnProperty.call(variables, name)
      ? variables[name]
      : undefined;

    if (op.startsWith(':-')) {
      return value !== undefined && value !== '' ? value : op.slice(2);
    }

    if (value === undefined) {
      throw new ConfigError(`Unknown placeholder '${match}'`, path);
    }

    if (op === '') return value;
    if (op === '^^') return value.toUpperCase();
    if (op === ',,') return value.toLowerCase();
    if (op.startsWith('//')) {
      const [from, to] = splitReplacement(op.slice(2));
      return from === '' ? value : value.split(from).join(to);
    }
    if (op.startsWith('/')) {
      const [from, to] = splitReplacement(op.slice(1));
      return from === '' ? value : value.replace(from, () => to);
    }

    throw new ConfigError(`Unsupported placeholder operator in '${match}'`, path);
  });
}

function splitReplacement(spec: string): [string, string] {
  const slash = spec.indexOf('/');
  if (slash === -1) return [spec, ''];
  return [spec.slice(0, slash), spec.slice(slash + 1)];
}

/** Substitute every value of a record, keeping keys as they are. */
export function substituteRecord<T>(
  record: Record<string, T>,
  apply: (value: T, key: string) => T,
): Record<string, T> {
  const out: Record<string, T> = {};
  for (const [key, value] of Object.entries(record)) {
    out[key] = apply(value, key);
  }
  return out;
}

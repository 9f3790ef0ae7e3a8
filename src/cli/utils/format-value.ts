/**
 * JSON値を人間が読みやすい形式で表示
 */
export function formatValue(value: unknown, indent = 0): string {
  const indentStr = '  '.repeat(indent);

  if (value === null || value === undefined) {
    return 'null';
  }

  if (typeof value === 'boolean' || typeof value === 'number') {
    return String(value);
  }

  if (typeof value === 'string') {
    return JSON.stringify(value);
  }

  if (Array.isArray(value)) {
    if (value.length === 0) {
      return '[]';
    }

    const items = value.map((item) => `${indentStr}  - ${formatValue(item, indent + 1)}`).join('\n');
    return `\n${items}`;
  }

  if (typeof value === 'object') {
    const entries = Object.entries(value);
    if (entries.length === 0) {
      return '{}';
    }

    const items = entries
      .map(([key, child]) => {
        const formatted = formatValue(child, indent + 1);
        if (formatted.startsWith('\n')) {
          return `${indentStr}  ${key}:${formatted}`;
        }
        return `${indentStr}  ${key}: ${formatted}`;
      })
      .join('\n');
    return `\n${items}`;
  }

  return String(value);
}

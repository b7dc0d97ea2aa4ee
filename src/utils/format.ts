/**
 * Title line followed by pretty-printed JSON
 */
export function formatJson(title: string, data: unknown): string {
  return `${title}:\n${JSON.stringify(data, null, 2)}`;
}

function escapeSoql(value: string): string {
  return value.replace(/\\/g, '\\\\').replace(/'/g, "\\'");
}

/**
 * Quote a value for use inside a SOQL string literal
 */
export function soqlString(value: string): string {
  return `'${escapeSoql(value)}'`;
}

/**
 * LIKE pattern matching values that contain the text, with % and _ in the
 * text matched literally
 */
export function soqlContainsPattern(value: string): string {
  return `'%${escapeSoql(value).replace(/[%_]/g, '\\$&')}%'`;
}

export function soqlStringList(values: string[]): string {
  return values.map(soqlString).join(', ');
}

export interface EnvMergeResult {
  content: string;
  written: string[];
  skipped: string[];
}

function formatValue(value: string): string {
  return /[\s#"'=]/.test(value) ? `"${value.replace(/"/g, '\\"')}"` : value;
}

function findKey(lines: string[], key: string): number {
  return lines.findIndex((line) => {
    const trimmed = line.trimStart().replace(/^export\s+/, '');
    return trimmed.startsWith(`${key}=`) || trimmed.startsWith(`${key} =`);
  });
}

/**
 * Agrega (o con `force` reemplaza) claves en el contenido de un `.env`,
 * conservando el resto de las líneas tal cual.
 */
export function mergeEnvEntries(
  content: string,
  entries: Record<string, string>,
  force: boolean,
): EnvMergeResult {
  const lines = content.length > 0 ? content.split(/\r?\n/) : [];
  if (lines.length > 0 && lines[lines.length - 1] === '') {
    lines.pop();
  }

  const written: string[] = [];
  const skipped: string[] = [];

  for (const [key, value] of Object.entries(entries)) {
    const entry = `${key}=${formatValue(value)}`;
    const index = findKey(lines, key);

    if (index === -1) {
      lines.push(entry);
      written.push(key);
    } else if (force) {
      lines[index] = entry;
      written.push(key);
    } else {
      skipped.push(key);
    }
  }

  return { content: `${lines.join('\n')}\n`, written, skipped };
}

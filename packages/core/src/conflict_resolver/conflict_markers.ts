const MARKER = /^(<{7}|={7}|>{7})(\s|$)/;

/**
 * 1-based line numbers of conflict marker lines.
 */
export function scanConflictMarkers(content: string): number[] {
  const lines: number[] = [];
  content.split('\n').forEach((line, index) => {
    if (MARKER.test(line)) {
      lines.push(index + 1);
    }
  });
  return lines;
}

export function countConflictSections(content: string): number {
  return content.split('\n').filter((line) => line.startsWith('<<<<<<<')).length;
}

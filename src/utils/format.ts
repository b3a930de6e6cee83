import path from 'path';

const pad = (n: number) => (n < 10 ? '0' + n : '' + n);

export function humanDate(d: Date = new Date()): string {
  const yyyy = d.getFullYear();
  const mm = pad(d.getMonth() + 1);
  const dd = pad(d.getDate());
  const hh = pad(d.getHours());
  const mi = pad(d.getMinutes());
  const ss = pad(d.getSeconds());
  return `${yyyy}-${mm}-${dd} ${hh}:${mi}:${ss}`;
}

/** Local time as `YYYYMMDD-HHMMSS`. */
export function archiveStamp(d: Date): string {
  const yyyy = String(d.getFullYear()).padStart(4, '0');
  return `${yyyy}${pad(d.getMonth() + 1)}${pad(d.getDate())}-${pad(d.getHours())}${pad(d.getMinutes())}${pad(d.getSeconds())}`;
}

/**
 * Split a file path at the last dot of its final segment.
 * The extension keeps its dot and is empty when the name has none.
 */
export function splitExtension(filePath: string): { base: string; ext: string } {
  const name = path.basename(filePath);
  const dot = name.lastIndexOf('.');
  if (dot < 0) return { base: filePath, ext: '' };
  const ext = name.slice(dot);
  return { base: filePath.slice(0, filePath.length - ext.length), ext };
}

/**
 * Archive path for a rotation at `when`: `<base>-<YYYYMMDD-HHMMSS>[-<n>]<ext>`.
 * `n` is only added for n > 0, to step past an archive from the same second.
 */
export function archiveName(filePath: string, when: Date, n = 0): string {
  const { base, ext } = splitExtension(filePath);
  const suffix = n > 0 ? `-${n}` : '';
  return `${base}-${archiveStamp(when)}${suffix}${ext}`;
}

const SIZE_UNITS: Record<string, number> = {
  '': 1,
  k: 1024,
  m: 1024 * 1024,
  g: 1024 * 1024 * 1024
};

/** Parse `1048576`, `512K`, `10M`, `1G` (optionally followed by `B`). Returns 0 when unparsable. */
export function parseSize(input?: string): number {
  const m = /^\s*(\d+)\s*([kmg]?)b?\s*$/i.exec(input ?? '');
  if (!m) return 0;
  return Number(m[1]) * SIZE_UNITS[m[2].toLowerCase()];
}

import path from 'path';

/**
 * Returns true if target is inside dir (or equal to dir).
 * Both paths must already be absolute and canonical; on Windows the
 * comparison ignores case.
 */
export function isWithinDir(target: string, dir: string, pathApi: path.PlatformPath = path): boolean {
  const fold = (p: string) => (pathApi.sep === '\\' ? p.toLowerCase() : p);
  const relative = pathApi.relative(fold(dir), fold(target));
  if (relative === '') return true;
  if (relative === '..' || relative.startsWith('..' + pathApi.sep)) return false;
  return !pathApi.isAbsolute(relative);
}

/** Windows batch shims need cmd.exe to run, which the supervisor never uses. */
export function isShellShim(file: string): boolean {
  return /\.(cmd|bat)$/i.test(file);
}

/** Lowercased base name without a Windows executable suffix. */
export function binaryName(file: string): string {
  const base = path.win32.basename(path.posix.basename(file));
  return base.replace(/\.(exe|cmd|bat)$/i, '').toLowerCase();
}

/** Appends to a byte buffer list until `limit` bytes are held. Returns whether anything was dropped. */
export function appendCapped(chunks: Buffer[], held: number, chunk: Buffer, limit: number): { held: number; dropped: boolean } {
  const room = limit - held;
  if (room <= 0) return { held, dropped: chunk.length > 0 };
  if (chunk.length <= room) {
    chunks.push(chunk);
    return { held: held + chunk.length, dropped: false };
  }
  chunks.push(chunk.subarray(0, room));
  return { held: limit, dropped: true };
}

import { execFileSync } from 'node:child_process';
import { accessSync, chmodSync, constants, existsSync } from 'node:fs';

function which(bin: string): string | null {
  try {
    return execFileSync('which', [bin], { encoding: 'utf-8' }).trim() || null;
  } catch {
    return null;
  }
}

export async function resolveFfprobePath(env: NodeJS.ProcessEnv = process.env): Promise<string | null> {
  if (env.FFPROBE_PATH && existsSync(env.FFPROBE_PATH)) return env.FFPROBE_PATH;
  try {
    const p: string | undefined = (await import('@ffprobe-installer/ffprobe')).path;
    if (p && existsSync(p)) return p;
  } catch {
    // Platform binary not installed; fall through to PATH
  }
  return which('ffprobe');
}

function ensureExecutable(filePath: string): void {
  try {
    accessSync(filePath, constants.X_OK);
  } catch {
    chmodSync(filePath, 0o755);
  }
}

let _ffprobePath: string | null = null;

/** Locates ffprobe once; later calls reuse the first answer. */
export async function ensureFfprobe(): Promise<string | null> {
  if (_ffprobePath) return _ffprobePath;
  const found = await resolveFfprobePath();
  if (!found) return null;
  ensureExecutable(found);
  _ffprobePath = found;
  return found;
}

export const FFPROBE_INSTALL_HINT =
  'ffprobe not found.\n' +
  '  Install ffmpeg (includes ffprobe):\n' +
  '    brew install ffmpeg (macOS) / sudo apt install ffmpeg (Linux)\n' +
  '  Or set FFPROBE_PATH environment variable.';

import fs from 'fs';
import path from 'path';

export type BuildInfo = {
  version: string | null;
  gitSha: string;
  buildTime: string;
};

const parseJson = (text: string): unknown => {
  try {
    return JSON.parse(text);
  } catch {
    return null;
  }
};

/**
 * Runtime build fingerprint, published once per session on the boot topic.
 *
 * How:
 * - Prefer files baked into the image at build time: `.gitsha`, `.buildtime`, `package.json`.
 * - Fall back to env vars if a builder injects them.
 * - Always return a value (never throw) so startup isn't blocked by missing metadata.
 */
export function getBuildInfo(cwd: string = process.cwd()): BuildInfo {
  const readTextFile = (filename: string): string | null => {
    const p = path.join(cwd, filename);
    if (!fs.existsSync(p)) return null;
    try {
      return fs.readFileSync(p, 'utf8').trim();
    } catch {
      return null;
    }
  };

  const gitSha = process.env.DEVICE_GIT_SHA || readTextFile('.gitsha') || 'unknown';
  const buildTime = process.env.DEVICE_BUILD_TIME || readTextFile('.buildtime') || new Date().toISOString();

  let version: string | null = null;
  const pkgText = readTextFile('package.json');
  const pkg = pkgText ? parseJson(pkgText) : null;
  if (typeof pkg === 'object' && pkg !== null && 'version' in pkg && typeof pkg.version === 'string') {
    version = pkg.version;
  }

  return { version, gitSha, buildTime };
}

import path from 'path';

/** The bits of the host platform the session layout depends on. */
export interface PlatformInfo {
  readonly windows: boolean;
  readonly path: path.PlatformPath;
}

export const posixPlatform: PlatformInfo = { windows: false, path: path.posix };
export const windowsPlatform: PlatformInfo = { windows: true, path: path.win32 };

export function currentPlatform(platform: NodeJS.Platform = process.platform): PlatformInfo {
  return platform === 'win32' ? windowsPlatform : posixPlatform;
}

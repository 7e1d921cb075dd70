/**
 * Shared-library naming per operating system
 */

export function isWindows(os: string): boolean {
  return os === "windows";
}

export function sharedLibraryPrefix(os: string): string {
  return isWindows(os) ? "" : "lib";
}

export function sharedLibrarySuffix(os: string): string {
  switch (os) {
    case "windows":
      return ".dll";
    case "macos":
      return ".dylib";
    default:
      return ".so";
  }
}

/**
 * File name the platform loader expects, e.g. `libtensorflow.so` or `tensorflow.dll`
 */
export function sharedLibraryFileName(os: string, name: string): string {
  return `${sharedLibraryPrefix(os)}${name}${sharedLibrarySuffix(os)}`;
}

/**
 * Import library MSVC links against (`tensorflow.lib`)
 */
export function importLibraryFileName(name: string): string {
  return `${name}.lib`;
}

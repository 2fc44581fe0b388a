import type { SemVer } from './types.js';

export function compareVersions(a: SemVer, b: SemVer): number {
    if (a.major !== b.major) return a.major - b.major;
    if (a.minor !== b.minor) return a.minor - b.minor;
    return a.patch - b.patch;
}

/**
 * Contract versions evolve additively: a loaded contract satisfies a request
 * when the major versions match and the loaded version is not older.
 */
export function isCompatible(requested: SemVer, loaded: SemVer): boolean {
    return requested.major === loaded.major && compareVersions(loaded, requested) >= 0;
}

/**
 * SoulDOS HAL — Module Manifest
 *
 * The manifest maps module names to their expected signature and provenance
 * URL. It is built once and frozen: entries are frozen objects held in a
 * private map that no method mutates.
 *
 * The default contents below are the only modules the shell knows about.
 */

import type { ModuleManifestEntry, ReadonlyModuleManifest } from '../types/manifest.js';

// ---------------------------------------------------------------------------
// Defaults
// ---------------------------------------------------------------------------

export const DEFAULT_MANIFEST_ENTRIES: ReadonlyArray<ModuleManifestEntry> = [
  {
    moduleName: 'SoulOS_Core',
    expectedSignature: 'hash_core_123_abc',
    provenanceUrl: 'gh://soulware/core/v1.0',
  },
  {
    moduleName: 'TensorMemoryDriver',
    expectedSignature: 'hash_tensor_xyz_789',
    provenanceUrl: 'gh://soulware/tensor/v0.9',
  },
  {
    moduleName: 'EmotionalResonanceEngine',
    expectedSignature: 'hash_ere_qwerty_456',
    provenanceUrl: 'gh://soulware/ere/v0.5',
  },
  {
    moduleName: 'UserInterfaceModule',
    expectedSignature: 'hash_ui_zxcv_321',
    provenanceUrl: 'gh://soulware/ui/v1.1',
  },
];

/**
 * Identifiers the internal source accepts without a manifest entry.
 */
export const DEFAULT_INTERNAL_ALLOW_LIST: ReadonlyArray<string> = ['HAL_Interface'];

/**
 * Locally "calculated" signatures that deliberately differ from the ledger.
 *
 * PLACEHOLDER: this table simulates a tampered module. It is not a hashing
 * scheme and no signature in the HAL is ever computed from module content.
 * Modules absent from this table calculate to their expected signature.
 */
export const DEFAULT_SIMULATED_MISMATCHES: ReadonlyMap<string, string> = new Map([
  ['UserInterfaceModule', 'hash_ui_zxcv_FAIL'],
]);

// ---------------------------------------------------------------------------
// ModuleManifest
// ---------------------------------------------------------------------------

export class ModuleManifest implements ReadonlyModuleManifest {
  private readonly byName: ReadonlyMap<string, ModuleManifestEntry>;

  /**
   * @throws {Error} if two entries share a module name
   */
  constructor(entries: Iterable<ModuleManifestEntry>) {
    const map = new Map<string, ModuleManifestEntry>();
    for (const entry of entries) {
      if (map.has(entry.moduleName)) {
        throw new Error(`Duplicate manifest entry for module '${entry.moduleName}'`);
      }
      map.set(entry.moduleName, Object.freeze({ ...entry }));
    }
    this.byName = map;
    Object.freeze(this);
  }

  get(moduleName: string): ModuleManifestEntry | undefined {
    return this.byName.get(moduleName);
  }

  has(moduleName: string): boolean {
    return this.byName.has(moduleName);
  }

  entries(): ReadonlyArray<ModuleManifestEntry> {
    return [...this.byName.values()];
  }

  get size(): number {
    return this.byName.size;
  }
}

export function createDefaultManifest(): ModuleManifest {
  return new ModuleManifest(DEFAULT_MANIFEST_ENTRIES);
}

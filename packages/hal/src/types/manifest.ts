/**
 * SoulDOS HAL — Manifest Types
 */

/**
 * One row of the module manifest.
 *
 * The signature is an opaque token. Nothing in the HAL derives it from
 * module content; it is only ever compared for equality.
 */
export interface ModuleManifestEntry {
  /** Module identifier, matched case-sensitively. */
  readonly moduleName: string;
  /** Signature the ledger expects for this module. */
  readonly expectedSignature: string;
  /** Where the expected signature was published. */
  readonly provenanceUrl: string;
}

/**
 * Read-only view of the module manifest.
 *
 * There is no mutating method: a manifest is fixed when it is constructed
 * and stays fixed for the lifetime of the process.
 */
export interface ReadonlyModuleManifest {
  get(moduleName: string): ModuleManifestEntry | undefined;
  has(moduleName: string): boolean;
  /** Entries in insertion order. */
  entries(): ReadonlyArray<ModuleManifestEntry>;
  readonly size: number;
}

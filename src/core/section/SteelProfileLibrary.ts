/**
 * Steel Profile Library
 *
 * Standard profile dimensions per family, loaded from the JSON tables in
 * src/data. Table keys have no spaces and use "_" for the decimal point
 * ("UNP200", "CHS21_3x2_3"); lookups also accept display names
 * ("CHS 21.3x2.3") and ignore case.
 */

import { ConsoleService } from '../console/ConsoleService';
import { ProfileNotFoundError } from './errors';
import type { ProfileOptions } from './Profile';
import { CHSProfile, type CHSDimensions } from './profiles/CHSProfile';
import { IProfile, type IDimensions } from './profiles/IProfile';
import { LNPProfile, type LNPDimensions } from './profiles/LNPProfile';
import { RHSProfile, type RHSDimensions } from './profiles/RHSProfile';
import { StripProfile, type StripDimensions } from './profiles/StripProfile';
import { UNPProfile, type UNPDimensions } from './profiles/UNPProfile';

import chsJson from '../../data/chs.json';
import heaJson from '../../data/hea.json';
import hebJson from '../../data/heb.json';
import ipeJson from '../../data/ipe.json';
import lnpJson from '../../data/lnp.json';
import rhsJson from '../../data/rhs.json';
import shsJson from '../../data/shs.json';
import stripJson from '../../data/strip.json';
import unpJson from '../../data/unp.json';

/** Dimension record per catalog family */
export interface CatalogDimensions {
  CHS: CHSDimensions;
  RHS: RHSDimensions;
  SHS: RHSDimensions;
  LNP: LNPDimensions;
  UNP: UNPDimensions;
  IPE: IDimensions;
  HEA: IDimensions;
  HEB: IDimensions;
  STRIP: StripDimensions;
}

/** Profile class built for each catalog family */
export interface CatalogProfiles {
  CHS: CHSProfile;
  RHS: RHSProfile;
  SHS: RHSProfile;
  LNP: LNPProfile;
  UNP: UNPProfile;
  IPE: IProfile;
  HEA: IProfile;
  HEB: IProfile;
  STRIP: StripProfile;
}

export type CatalogFamily = keyof CatalogDimensions;

export interface CatalogRecord<D> {
  /** Display name, e.g. "UNP 200" */
  readonly name: string;
  readonly dimensions: Readonly<D>;
}

/** Search hit */
export interface CatalogMatch {
  family: CatalogFamily;
  key: string;
  name: string;
}

type CatalogTables = { [F in CatalogFamily]: ReadonlyMap<string, CatalogRecord<CatalogDimensions[F]>> };

type ProfileFactories = {
  [F in CatalogFamily]: (dimensions: Readonly<CatalogDimensions[F]>, options: ProfileOptions) => CatalogProfiles[F];
};

const FACTORIES: ProfileFactories = {
  CHS: (dimensions, options) => new CHSProfile(dimensions, options),
  RHS: (dimensions, options) => new RHSProfile(dimensions, options),
  SHS: (dimensions, options) => new RHSProfile(dimensions, options),
  LNP: (dimensions, options) => new LNPProfile(dimensions, options),
  UNP: (dimensions, options) => new UNPProfile(dimensions, options),
  IPE: (dimensions, options) => new IProfile(dimensions, options),
  HEA: (dimensions, options) => new IProfile(dimensions, options),
  HEB: (dimensions, options) => new IProfile(dimensions, options),
  STRIP: (dimensions, options) => new StripProfile(dimensions, options),
};

/** Lower case, no whitespace, "." and "_" interchangeable */
export function normalizeProfileKey(key: string): string {
  return key.toLowerCase().replace(/\s+/g, '').replace(/\./g, '_');
}

function loadTable<D>(json: Record<string, { name: string; dimensions: D }>): ReadonlyMap<string, CatalogRecord<D>> {
  const table = new Map<string, CatalogRecord<D>>();
  for (const [key, record] of Object.entries(json)) {
    Object.freeze(record.dimensions);
    Object.freeze(record);
    table.set(key, record);
  }
  return table;
}

/**
 * Steel Profile Library singleton
 */
class SteelProfileLibraryClass {
  private readonly tables: CatalogTables;
  // normalized key or display name -> table key, per family
  private readonly aliases = new Map<CatalogFamily, Map<string, string>>();

  constructor() {
    this.tables = {
      CHS: loadTable<CHSDimensions>(chsJson),
      RHS: loadTable<RHSDimensions>(rhsJson),
      SHS: loadTable<RHSDimensions>(shsJson),
      LNP: loadTable<LNPDimensions>(lnpJson),
      UNP: loadTable<UNPDimensions>(unpJson),
      IPE: loadTable<IDimensions>(ipeJson),
      HEA: loadTable<IDimensions>(heaJson),
      HEB: loadTable<IDimensions>(hebJson),
      STRIP: loadTable<StripDimensions>(stripJson),
    };

    for (const family of this.familyNames()) {
      const aliases = new Map<string, string>();
      for (const [key, record] of this.tables[family]) {
        aliases.set(normalizeProfileKey(key), key);
        aliases.set(normalizeProfileKey(record.name), key);
      }
      this.aliases.set(family, aliases);
    }
  }

  familyNames(): CatalogFamily[] {
    return ['CHS', 'RHS', 'SHS', 'LNP', 'UNP', 'IPE', 'HEA', 'HEB', 'STRIP'];
  }

  /**
   * Find a profile record; exact key first, then the normalized key or
   * display name. A miss is logged as a warning.
   */
  findProfile<F extends CatalogFamily>(family: F, key: string): CatalogRecord<CatalogDimensions[F]> | undefined {
    const table = this.tables[family];
    const exact = table.get(key);
    if (exact !== undefined) return exact;

    const resolved = this.aliases.get(family)?.get(normalizeProfileKey(key));
    const record = resolved === undefined ? undefined : table.get(resolved);
    if (record === undefined) {
      ConsoleService.warn(`No ${family} profile named "${key}"`, 'catalog');
    }
    return record;
  }

  /** Like findProfile, but a miss throws ProfileNotFoundError */
  getProfile<F extends CatalogFamily>(family: F, key: string): CatalogRecord<CatalogDimensions[F]> {
    const record = this.findProfile(family, key);
    if (record === undefined) {
      throw new ProfileNotFoundError(family, key);
    }
    return record;
  }

  /**
   * Construct the profile for a standard size. The catalog display name is
   * used unless `options.name` is given.
   */
  fromStandard<F extends CatalogFamily>(family: F, key: string, options: ProfileOptions = {}): CatalogProfiles[F] {
    const { name, dimensions } = this.getProfile(family, key);
    const create = FACTORIES[family];
    return create(dimensions, { ...options, name: options.name ?? name });
  }

  profilesOf<F extends CatalogFamily>(family: F): IterableIterator<CatalogRecord<CatalogDimensions[F]>> {
    return this.tables[family].values();
  }

  keysOf(family: CatalogFamily): string[] {
    return Array.from(this.tables[family].keys());
  }

  /**
   * Case-insensitive substring search over keys and display names of all
   * families
   */
  searchProfiles(query: string, limit = 50): CatalogMatch[] {
    const q = normalizeProfileKey(query);
    const results: CatalogMatch[] = [];

    for (const family of this.familyNames()) {
      for (const [key, record] of this.tables[family]) {
        if (results.length >= limit) return results;
        if (normalizeProfileKey(key).includes(q) || normalizeProfileKey(record.name).includes(q)) {
          results.push({ family, key, name: record.name });
        }
      }
    }
    return results;
  }

  /**
   * Total number of profiles over all families
   */
  get count(): number {
    return this.familyNames().reduce((sum, family) => sum + this.tables[family].size, 0);
  }
}

// Export singleton instance
export const SteelProfileLibrary = new SteelProfileLibraryClass();

// Export type for external use
export type { SteelProfileLibraryClass };

import { beforeEach, describe, it, expect } from 'vitest';
import { SteelProfileLibrary, normalizeProfileKey } from './SteelProfileLibrary';
import { ConsoleService } from '../console/ConsoleService';
import { ProfileNotFoundError } from './errors';
import { IProfile } from './profiles/IProfile';
import { RHSProfile } from './profiles/RHSProfile';
import { UNPProfile } from './profiles/UNPProfile';

describe('normalizeProfileKey', () => {
  it('ignores case, whitespace and the decimal separator', () => {
    expect(normalizeProfileKey('CHS 21.3x2.3')).toBe('chs21_3x2_3');
    expect(normalizeProfileKey('CHS21_3x2_3')).toBe('chs21_3x2_3');
  });
});

describe('SteelProfileLibrary', () => {
  beforeEach(() => {
    ConsoleService.setMinLevel('info');
    ConsoleService.clear();
  });

  it('loads every family', () => {
    expect(SteelProfileLibrary.familyNames()).toEqual(['CHS', 'RHS', 'SHS', 'LNP', 'UNP', 'IPE', 'HEA', 'HEB', 'STRIP']);
    expect(SteelProfileLibrary.count).toBe(698);
    expect(Array.from(SteelProfileLibrary.profilesOf('UNP'))).toHaveLength(12);
    expect(SteelProfileLibrary.keysOf('UNP')[0]).toBe('UNP80');
  });

  describe('findProfile', () => {
    it('finds a profile by key', () => {
      expect(SteelProfileLibrary.findProfile('UNP', 'UNP200')?.name).toBe('UNP 200');
    });

    it('finds a profile by display name', () => {
      const record = SteelProfileLibrary.findProfile('CHS', 'chs 21.3x2.3');
      expect(record?.dimensions).toEqual({ outerDiameter: 21.3, wallThickness: 2.3 });
    });

    it('finds a strip by its size', () => {
      expect(SteelProfileLibrary.findProfile('STRIP', '160x5')?.dimensions).toEqual({ width: 160, height: 5 });
    });

    it('warns about a missing profile', () => {
      expect(SteelProfileLibrary.findProfile('CHS', 'nope')).toBeUndefined();
      const [entry] = ConsoleService.getEntries();
      expect(entry.level).toBe('warn');
      expect(entry.source).toBe('catalog');
      expect(entry.content).toBe('No CHS profile named "nope"');
    });

    it('hands out frozen records', () => {
      const record = SteelProfileLibrary.getProfile('UNP', 'UNP200');
      expect(Object.isFrozen(record)).toBe(true);
      expect(Object.isFrozen(record.dimensions)).toBe(true);
    });
  });

  it('throws for a missing profile on getProfile', () => {
    expect(() => SteelProfileLibrary.getProfile('CHS', 'nope')).toThrow(ProfileNotFoundError);
    expect(() => SteelProfileLibrary.getProfile('CHS', 'nope')).toThrow('Profile "nope" not found in the CHS catalog');
  });

  describe('fromStandard', () => {
    it('builds the profile of the family', () => {
      const unp = SteelProfileLibrary.fromStandard('UNP', 'UNP200');
      expect(unp).toBeInstanceOf(UNPProfile);
      expect(unp.name).toBe('UNP 200');
      expect(unp.area).toBeCloseTo(3218.654, 3);
    });

    it('builds square hollow sections as RHS', () => {
      const shs = SteelProfileLibrary.fromStandard('SHS', 'SHS40x4');
      expect(shs).toBeInstanceOf(RHSProfile);
      expect(shs.dimensions.totalWidth).toBe(40);
    });

    it('builds I-sections from the IPE, HEA and HEB tables', () => {
      const ipe = SteelProfileLibrary.fromStandard('IPE', 'ipe 200');
      expect(ipe).toBeInstanceOf(IProfile);
      expect(ipe.name).toBe('IPE 200');
      expect(ipe.area).toBeCloseTo(2848.985, 3);
      expect(SteelProfileLibrary.keysOf('HEA')[0]).toBe('HEA100');
      expect(SteelProfileLibrary.fromStandard('HEB', 'HEB300').dimensions.topFlangeWidth).toBe(300);
    });

    it('keeps the catalog name through corrosion', () => {
      const strip = SteelProfileLibrary.fromStandard('STRIP', '160x5');
      expect(strip.name).toBe('160x5');
      expect(strip.withCorrosion(1).name).toBe('160x5 (corrosion: 1.0 mm)');
    });

    it('takes name and placement from the options', () => {
      const unp = SteelProfileLibrary.fromStandard('UNP', 'UNP200', { name: 'Purlin', horizontalOffset: 100 });
      expect(unp.name).toBe('Purlin');
      expect(unp.horizontalOffset).toBe(100);
      expect(unp.polygon.bounds.minX).toBeCloseTo(100 - 20.14391, 3);
    });
  });

  describe('searchProfiles', () => {
    it('matches keys and names', () => {
      expect(SteelProfileLibrary.searchProfiles('unp 2').map(m => m.key)).toEqual([
        'UNP200',
        'UNP220',
        'UNP240',
        'UNP260',
        'UNP280',
      ]);
    });

    it('stops at the limit, in family order', () => {
      expect(SteelProfileLibrary.searchProfiles('40x4', 3)).toEqual([
        { family: 'RHS', key: 'RHS60x40x4', name: 'RHS60x40x4' },
        { family: 'RHS', key: 'RHS80x40x4', name: 'RHS80x40x4' },
        { family: 'SHS', key: 'SHS40x4', name: 'SHS40x4' },
      ]);
    });
  });
});

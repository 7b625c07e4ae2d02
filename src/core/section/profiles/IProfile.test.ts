import { describe, it, expect } from 'vitest';
import { IProfile, type IDimensions } from './IProfile';
import { FullyCorrodedError, NegativeValueError, NotPositiveValueError } from '../errors';
import { convertMomentOfInertia } from '../../../utils/units';

const ipe200: IDimensions = {
  topFlangeWidth: 100,
  topFlangeThickness: 8.5,
  bottomFlangeWidth: 100,
  bottomFlangeThickness: 8.5,
  totalHeight: 200,
  webThickness: 5.6,
  topRadius: 12,
  bottomRadius: 12,
};

describe('IProfile', () => {
  const ipe = new IProfile(ipe200, { name: 'IPE 200' });

  it('derives the web height and flange outstands', () => {
    expect(ipe.webHeight).toBe(159);
    expect(ipe.topFlangeOutstand).toBeCloseTo(35.2, 12);
    expect(ipe.bottomFlangeOutstand).toBeCloseTo(35.2, 12);
    expect(ipe.maxProfileThickness).toBe(8.5);
  });

  it('matches the tabulated section values', () => {
    // Each root fillet adds r² minus the tessellated quarter circle
    const fillets = 4 * 144 * (1 - 9 * Math.sin(Math.PI / 36));
    expect(ipe.area).toBeCloseTo(2 * 100 * 8.5 + 183 * 5.6 + fillets, 9);
    expect(ipe.polygon.outer).toHaveLength(84);
    expect(ipe.profileWidth).toBeCloseTo(100, 9);
    expect(ipe.profileHeight).toBeCloseTo(200, 9);

    const props = ipe.sectionProperties();
    expect(convertMomentOfInertia(props.Ixx_c, 'cm⁴')).toBeCloseTo(1943.6, 1);
    expect(convertMomentOfInertia(props.Iyy_c, 'cm⁴')).toBeCloseTo(142.37, 1);
  });

  it('centres the web on flanges of different widths', () => {
    const profile = new IProfile({
      topFlangeWidth: 200,
      topFlangeThickness: 10,
      bottomFlangeWidth: 100,
      bottomFlangeThickness: 20,
      totalHeight: 300,
      webThickness: 8,
      topRadius: 10,
      bottomRadius: 10,
    });
    const { minX, maxX, minY, maxY } = profile.polygon.bounds;
    expect(minX).toBeCloseTo(-100, 9);
    expect(maxX).toBeCloseTo(100, 9);
    // Centroid 146.601 mm below the top face
    expect(maxY).toBeCloseTo(146.601, 3);
    expect(minY).toBeCloseTo(-153.399, 3);
    expect(profile.area).toBeCloseTo(6246.239, 3);
  });

  it('rejects missing plates and negative radii', () => {
    expect(() => new IProfile({ ...ipe200, webThickness: 0 })).toThrow(NotPositiveValueError);
    expect(() => new IProfile({ ...ipe200, topRadius: -1 })).toThrow(NegativeValueError);
  });

  it('rejects fillets wider than the flange', () => {
    expect(() => new IProfile({ ...ipe200, topRadius: 50 })).toThrow(NegativeValueError);
    expect(() => new IProfile({ ...ipe200, totalHeight: 30 })).toThrow(
      'Negative values are not allowed: webHeight=-11'
    );
  });

  describe('withCorrosion', () => {
    it('thins every plate and grows the fillets', () => {
      const corroded = ipe.withCorrosion(1);
      expect(corroded.dimensions.topFlangeWidth).toBe(98);
      expect(corroded.dimensions.bottomFlangeThickness).toBe(6.5);
      expect(corroded.dimensions.totalHeight).toBe(198);
      expect(corroded.dimensions.webThickness).toBeCloseTo(3.6, 12);
      expect(corroded.dimensions.topRadius).toBe(13);
      expect(corroded.webHeight).toBe(159);
      expect(corroded.topFlangeOutstand).toBeCloseTo(34.2, 12);
      expect(corroded.area).toBeCloseTo(2085.744, 2);
      expect(corroded.name).toBe('IPE 200 (corrosion: 1.0 mm)');
    });

    it('returns the same instance for zero corrosion', () => {
      expect(ipe.withCorrosion(0)).toBe(ipe);
    });

    it('equals one combined step when applied twice', () => {
      const twice = ipe.withCorrosion(1).withCorrosion(0.5);
      const once = ipe.withCorrosion(1.5);
      const expected = Object.fromEntries(
        Object.entries(once.dimensions).map(([key, value]) => [key, expect.closeTo(value, 9)])
      );
      expect(twice.dimensions).toEqual(expected);
      expect(twice.name).toBe('IPE 200 (corrosion: 1.5 mm)');
    });

    it('keeps a valid profile until the web is almost gone', () => {
      const thin = ipe.withCorrosion(2.75);
      expect(thin.dimensions.webThickness).toBeCloseTo(0.1, 9);
      expect(thin.area).toBeCloseTo(773.474, 2);
      expect(thin.area).toBeLessThan(ipe.area);
    });

    it('fails when the web is gone', () => {
      expect(() => ipe.withCorrosion(2.8)).toThrow(FullyCorrodedError);
    });

    it('fails when the growing fillets use up the flange outstand', () => {
      const stocky = new IProfile({
        ...ipe200,
        topFlangeWidth: 40,
        bottomFlangeWidth: 40,
        topFlangeThickness: 20,
        bottomFlangeThickness: 20,
        webThickness: 10,
        topRadius: 14,
        bottomRadius: 14,
      });
      expect(stocky.topFlangeOutstand).toBe(1);
      expect(() => stocky.withCorrosion(1)).toThrow(FullyCorrodedError);
    });

    it('rejects negative corrosion', () => {
      expect(() => ipe.withCorrosion(-1)).toThrow(NegativeValueError);
    });
  });
});

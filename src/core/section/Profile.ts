/**
 * Profile base class
 *
 * A profile owns a validated, frozen dimension record and resolves it to a
 * ClosedPolygon on first use. Placement (offsets and rotation) is applied on
 * top of the local polygon: rotation about the centroid first, then the
 * translation.
 */

import type { ClosedPolygon } from './ClosedPolygon';
import type { Vec2 } from './Geometry2D';
import { calculateSectionProperties, type SectionPropertiesResult } from './SectionProperties';
import { convertVolume, MM_PER_M } from '../../utils/units';

export type ProfileFamily =
  | 'CHS'
  | 'RHS'
  | 'I'
  | 'LNP'
  | 'UNP'
  | 'STRIP'
  | 'CORNERED'
  | 'ANNULAR_SECTOR';

export interface ProfilePlacement {
  /** Positive values move the profile to the right [mm] */
  horizontalOffset: number;
  /** Positive values move the profile upwards [mm] */
  verticalOffset: number;
  /** Counter-clockwise rotation about the centroid [deg] */
  rotation: number;
}

export interface ProfileOptions extends Partial<ProfilePlacement> {
  name?: string;
  /** Carried along untouched (colour, layer, ...) */
  metadata?: Readonly<Record<string, unknown>>;
}

export interface ProfileJSON<D> extends ProfilePlacement {
  family: ProfileFamily;
  name: string;
  dimensions: D;
  metadata?: Readonly<Record<string, unknown>>;
}

export abstract class Profile<D extends object, Self extends Profile<D, Self>> {
  abstract readonly family: ProfileFamily;

  readonly name: string;
  readonly dimensions: Readonly<D>;
  readonly horizontalOffset: number;
  readonly verticalOffset: number;
  readonly rotation: number;
  readonly metadata?: Readonly<Record<string, unknown>>;

  private cachedLocal?: ClosedPolygon;
  private cachedPolygon?: ClosedPolygon;

  protected constructor(dimensions: D, defaultName: string, options: ProfileOptions = {}) {
    this.dimensions = Object.freeze({ ...dimensions });
    this.name = options.name ?? defaultName;
    this.horizontalOffset = options.horizontalOffset ?? 0;
    this.verticalOffset = options.verticalOffset ?? 0;
    this.rotation = options.rotation ?? 0;
    if (options.metadata !== undefined) {
      this.metadata = options.metadata;
    }
  }

  /** Build the untransformed boundary from the dimensions */
  protected abstract buildPolygon(): ClosedPolygon;

  /** Create a profile of the same family */
  protected abstract create(dimensions: D, options: ProfileOptions): Self;

  /** Thickest wall or plate of the profile [mm] */
  abstract get maxProfileThickness(): number;

  protected get options(): ProfileOptions {
    return {
      name: this.name,
      horizontalOffset: this.horizontalOffset,
      verticalOffset: this.verticalOffset,
      rotation: this.rotation,
      metadata: this.metadata,
    };
  }

  /** Polygon without offsets and rotation */
  get localPolygon(): ClosedPolygon {
    this.cachedLocal ??= this.buildPolygon();
    return this.cachedLocal;
  }

  /** Polygon with offsets and rotation applied */
  get polygon(): ClosedPolygon {
    this.cachedPolygon ??= this.localPolygon
      .rotate(this.rotation)
      .translate(this.horizontalOffset, this.verticalOffset);
    return this.cachedPolygon;
  }

  /**
   * New profile with the given increments added to the current placement.
   */
  transform(placement: Partial<ProfilePlacement> = {}): Self {
    return this.create(this.dimensions, {
      ...this.options,
      horizontalOffset: this.horizontalOffset + (placement.horizontalOffset ?? 0),
      verticalOffset: this.verticalOffset + (placement.verticalOffset ?? 0),
      rotation: this.rotation + (placement.rotation ?? 0),
    });
  }

  /** Area of the tessellated polygon [mm²] */
  get area(): number {
    return this.polygon.area;
  }

  /** Length of every ring [mm] */
  get perimeter(): number {
    return this.polygon.perimeter;
  }

  get centroid(): Vec2 {
    return this.polygon.centroid;
  }

  get profileHeight(): number {
    return this.polygon.height;
  }

  get profileWidth(): number {
    return this.polygon.width;
  }

  /** Steel volume per metre length [m³/m] */
  get volumePerMeter(): number {
    return convertVolume(this.area * MM_PER_M, 'm³');
  }

  sectionProperties(): SectionPropertiesResult {
    return calculateSectionProperties(this.polygon.toSectionGeometry());
  }

  toJSON(): ProfileJSON<D> {
    const json: ProfileJSON<D> = {
      family: this.family,
      name: this.name,
      dimensions: { ...this.dimensions },
      horizontalOffset: this.horizontalOffset,
      verticalOffset: this.verticalOffset,
      rotation: this.rotation,
    };
    if (this.metadata !== undefined) json.metadata = this.metadata;
    return json;
  }
}

/**
 * Profile geometry module
 *
 * Path construction, polygon assembly, section properties, parametric
 * profiles and the standard profile catalog.
 */

export {
  Vec2,
  POINT_TOLERANCE,
  degToRad,
  radToDeg,
  pointsEqual,
  segmentsCross,
  type Point2D,
} from './Geometry2D';

export {
  NegativeValueError,
  NotPositiveValueError,
  PreconditionError,
  InvalidPolygonError,
  FullyCorrodedError,
  ProfileNotFoundError,
} from './errors';

export { raiseIfNegative, raiseIfNotPositive, raiseIfNotFinite } from './validation';

export {
  getSectionConfig,
  configureSection,
  resetSectionConfig,
  DEFAULT_SECTION_CONFIG,
  type SectionConfig,
} from './config';

// Path and polygon construction
export { PathBuilder, tessellateArc, type PathState, type PathBuilderOptions } from './PathBuilder';
export {
  ClosedPolygon,
  normalizeRing,
  ringLength,
  isRingSimple,
  pointInRing,
  type Bounds,
} from './ClosedPolygon';
export { mergePolygons, intersectPolygons, differencePolygons } from './PolygonBoolean';

// Section properties
export {
  calculateSectionProperties,
  calculatePlasticModulus,
  calculateArea,
  calculateSignedArea,
  calculateCentroid,
  calculateAreaIntegrals,
  calculateRingIntegrals,
  calculatePrincipalMoments,
  getBoundingBox,
  type Ring,
  type SectionGeometry,
  type AreaIntegrals,
  type SectionPropertiesResult,
} from './SectionProperties';

// Profiles
export {
  Profile,
  type ProfileFamily,
  type ProfilePlacement,
  type ProfileOptions,
  type ProfileJSON,
} from './Profile';
export {
  FULL_CORROSION_TOLERANCE,
  formatCorrosion,
  updateNameWithCorrosion,
  shrinkRadius,
  growRadius,
  assertNotFullyCorroded,
  type SingleCorrosion,
  type DoubleCorrosion,
  type CorrosionSpec,
} from './corrosion';
export { CHSProfile, type CHSDimensions } from './profiles/CHSProfile';
export {
  RHSProfile,
  uniformRHSDimensions,
  type RHSDimensions,
  type UniformRHSDimensions,
} from './profiles/RHSProfile';
export { IProfile, type IDimensions } from './profiles/IProfile';
export { LNPProfile, type LNPDimensions } from './profiles/LNPProfile';
export { UNPProfile, slopeToAngle, type UNPDimensions, type FlangeGeometry } from './profiles/UNPProfile';
export { StripProfile, type StripDimensions } from './profiles/StripProfile';
export {
  CircularCorneredProfile,
  type CorneredDimensions,
  type CornerDirection,
  type CornerReferencePoint,
} from './profiles/CircularCorneredProfile';
export { AnnularSectorProfile, type AnnularSectorDimensions } from './profiles/AnnularSectorProfile';

// Catalog
export {
  SteelProfileLibrary,
  normalizeProfileKey,
  type SteelProfileLibraryClass,
  type CatalogFamily,
  type CatalogDimensions,
  type CatalogProfiles,
  type CatalogRecord,
  type CatalogMatch,
} from './SteelProfileLibrary';

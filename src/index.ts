export * from './core/section';
export { ConsoleService, type ConsoleEntry, type LogLevel, type ConsoleServiceImpl } from './core/console/ConsoleService';
export {
  MM_PER_M,
  convertLength,
  convertArea,
  convertVolume,
  convertMomentOfInertia,
  convertFromMm,
  formatWithUnit,
  type LengthUnit,
  type AreaUnit,
  type VolumeUnit,
  type MomentOfInertiaUnit,
  type UnitTypeKey,
} from './utils/units';

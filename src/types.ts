/**
 * Public Types
 *
 * Type-only re-exports for consumers that do not need the runtime API.
 */

export type {
  BvhToolkitConfig,
  BvhToolkitConfigInput,
  RecorderOptions,
  RecorderOptionsInput,
  LoaderOptions,
  LoaderOptionsInput
} from './schemas';
export type { BvhDocument, BvhJoint, BvhChannel } from './core/bvh-document';
export type { CoordinateConvention, EulerZXY } from './core/coordinate-convention';
export type { Skeleton, SkeletonJoint, PoseSnapshot } from './core/skeleton';
export type { RigView } from './core/rig-view';
export type { Curve, CurveKey, CurveProperty } from './converters/curve-decoder';
export type { BvhPrecision } from './utils/bvh-formatter';
export type { Quat, Vec3 } from './utils/quaternion-utils';

/**
 * Base Schemas
 *
 * Common validation schemas shared by the recorder, the loader and the
 * toolkit configuration.
 */

import { z } from 'zod';

/**
 * Coordinate Convention Schema
 */
export const ConventionSchema = z.enum(['standard', 'blender']);

/**
 * Output Precision Schema
 */
export const PrecisionSchema = z.enum(['high', 'low']);

/**
 * Frame Rate Schema (frames per second)
 */
export const FrameRateSchema = z.number()
  .finite()
  .positive('Frame rate must be greater than zero');

/**
 * Bone Renaming Map Schema (BVH joint name to rig node name)
 */
export const BoneRenamingMapSchema = z.record(z.string(), z.string());

/**
 * Zod Schemas for the BVH Toolkit
 *
 * All validation schemas using Zod for type safety and validation.
 */

import { z } from 'zod';
import { DEFAULT_CONFIG } from '../constants/config';
import { BoneRenamingMapSchema, ConventionSchema, FrameRateSchema, PrecisionSchema } from './base-schemas';

/**
 * Recorder Options Schema
 */
export const RecorderOptionsSchema = z.object({
  frameRate: FrameRateSchema.optional().default(DEFAULT_CONFIG.FRAME_RATE),
  convention: ConventionSchema.optional().default(DEFAULT_CONFIG.CONVENTION),
  precision: PrecisionSchema.optional().default(DEFAULT_CONFIG.PRECISION),
  overwrite: z.boolean().optional().default(DEFAULT_CONFIG.OVERWRITE),
  /** Directory for saved files without a directory part */
  directory: z.string().optional().default(''),
  debug: z.boolean().optional().default(DEFAULT_CONFIG.DEBUG),
});

/**
 * Animation Loader Options Schema
 */
export const LoaderOptionsSchema = z.object({
  convention: ConventionSchema.optional().default(DEFAULT_CONFIG.CONVENTION),
  respectBvhTime: z.boolean().optional().default(DEFAULT_CONFIG.RESPECT_BVH_TIME),
  frameRate: FrameRateSchema.optional().default(DEFAULT_CONFIG.FRAME_RATE),
  flexibleBoneNames: z.boolean().optional().default(DEFAULT_CONFIG.FLEXIBLE_BONE_NAMES),
  boneRenamingMap: BoneRenamingMapSchema.optional().default({}),
  clipName: z.string().optional().default(''),
  debug: z.boolean().optional().default(DEFAULT_CONFIG.DEBUG),
});

/**
 * Toolkit Configuration Schema
 */
export const BvhToolkitConfigSchema = z.object({
  debug: z.boolean().optional().default(DEFAULT_CONFIG.DEBUG),
  convention: ConventionSchema.optional().default(DEFAULT_CONFIG.CONVENTION),
  precision: PrecisionSchema.optional().default(DEFAULT_CONFIG.PRECISION),
  frameRate: FrameRateSchema.optional().default(DEFAULT_CONFIG.FRAME_RATE),
  respectBvhTime: z.boolean().optional().default(DEFAULT_CONFIG.RESPECT_BVH_TIME),
  flexibleBoneNames: z.boolean().optional().default(DEFAULT_CONFIG.FLEXIBLE_BONE_NAMES),
  boneRenamingMap: BoneRenamingMapSchema.optional().default({}),
  /** Resample the written animation to drop redundant keyframes */
  resample: z.boolean().optional().default(DEFAULT_CONFIG.RESAMPLE),
});

/**
 * Type exports for TypeScript inference
 */
export type RecorderOptions = z.infer<typeof RecorderOptionsSchema>;
export type RecorderOptionsInput = z.input<typeof RecorderOptionsSchema>;
export type LoaderOptions = z.infer<typeof LoaderOptionsSchema>;
export type LoaderOptionsInput = z.input<typeof LoaderOptionsSchema>;
export type BvhToolkitConfig = z.infer<typeof BvhToolkitConfigSchema>;
export type BvhToolkitConfigInput = z.input<typeof BvhToolkitConfigSchema>;

// Re-export base schemas
export { BoneRenamingMapSchema, ConventionSchema, FrameRateSchema, PrecisionSchema } from './base-schemas';

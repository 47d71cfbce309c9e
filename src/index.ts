/**
 * BVH Motion Toolkit
 *
 * Reads and writes BVH motion capture files and moves motion between BVH
 * and glTF rigs.
 *
 * @example
 * ```typescript
 * import { defineConfig } from 'bvh-motion-toolkit';
 *
 * const bvh = defineConfig({
 *   convention: 'blender',
 *   frameRate: 30
 * });
 *
 * const text = await bvh.record('./character.glb', { animation: 'Walk' });
 * const glb = await bvh.loadToGlb(text, './character.glb');
 * ```
 */

import { Animation, Document, Node } from '@gltf-transform/core';
import type { BvhDocument } from './core/bvh-document';
import type { PoseSnapshot, Skeleton } from './core/skeleton';
import { BvhAnimationLoader } from './converters/bvh-animation-loader';
import { BvhRecorder } from './converters/bvh-recorder';
import { serializeBvh } from './converters/bvh-serializer';
import { postprocessGltfDocument } from './converters/helpers/gltf-transform-helpers';
import { GltfParserFactory, RigInput, writeGlb } from './converters/parsers/gltf-parser-factory';
import { parseBvh, parseBvhFile } from './converters/parsers/bvh-parser';
import { BvhErrorFactory } from './errors';
import { BvhToolkitConfig, BvhToolkitConfigInput, BvhToolkitConfigSchema } from './schemas';
import { Logger, LoggerFactory } from './utils/logger';
import { validateConfig } from './validation';

/**
 * Options for recording from a rig
 */
export interface RecordOptions {
  /** Animation to sample, by name or index; the current pose when omitted */
  animation?: string | number;
  /** Name of the node carrying the rig's placement and scale */
  rigNode?: string;
  /** Name of the node whose descendant joints are recorded */
  rootBone?: string;
}

/**
 * Options for applying BVH motion to a rig
 */
export interface LoadOptions {
  /** Name of the node the motion is applied under */
  rigNode?: string;
  /** Name of the new animation */
  clipName?: string;
}

function findNode(document: Document, name: string | undefined, role: string): Node | null {
  if (name === undefined) {
    return null;
  }
  const node = document.getRoot().listNodes().find(candidate => candidate.getName() === name);
  if (!node) {
    throw BvhErrorFactory.nameResolutionError(`No ${role} node named "${name}" found.`, name, null);
  }
  return node;
}

function findAnimation(document: Document, selector: string | number): Animation {
  const animations = document.getRoot().listAnimations();
  const animation = typeof selector === 'number'
    ? animations[selector]
    : animations.find(candidate => candidate.getName() === selector);
  if (!animation) {
    throw BvhErrorFactory.stateError(`No animation ${JSON.stringify(selector)} found.`, 'record', {
      available: animations.map(candidate => candidate.getName())
    });
  }
  return animation;
}

/**
 * Main toolkit class
 */
export class BvhToolkit {
  private config: BvhToolkitConfig;
  private logger: Logger;

  constructor(config: BvhToolkitConfigInput = {}) {
    this.config = validateConfig(BvhToolkitConfigSchema, config, 'BvhToolkitConfig');
    this.logger = LoggerFactory.forCodec(this.config.debug);
  }

  /**
   * Parse BVH text
   *
   * With `respectBvhTime` off, the configured frame rate replaces the
   * file's Frame Time.
   */
  parse(text: string): BvhDocument {
    return parseBvh(text, { debug: this.config.debug, logger: this.logger, frameTimeOverride: this.frameTimeOverride() });
  }

  /**
   * Parse BVH file from file path
   */
  async parseFile(filePath: string): Promise<BvhDocument> {
    return await parseBvhFile(filePath, { debug: this.config.debug, logger: this.logger, frameTimeOverride: this.frameTimeOverride() });
  }

  /**
   * Write a skeleton and poses as BVH text
   */
  serialize(skeleton: Skeleton, frames: readonly (PoseSnapshot | string)[]): string {
    return serializeBvh(skeleton, frames, this.config);
  }

  /**
   * Record BVH text from a glTF rig
   *
   * @example
   * ```typescript
   * const text = await bvh.record('./character.glb', { animation: 0 });
   * ```
   */
  async record(rig: RigInput, options: RecordOptions = {}): Promise<string> {
    const document = await GltfParserFactory.parse(rig);
    const recorder = new BvhRecorder(
      {
        document,
        rigNode: findNode(document, options.rigNode, 'rig'),
        rootBone: findNode(document, options.rootBone, 'root bone'),
      },
      {
        frameRate: this.config.frameRate,
        convention: this.config.convention,
        precision: this.config.precision,
        debug: this.config.debug,
      }
    );

    recorder.detectBones();
    recorder.buildSkeleton();
    recorder.genHierarchy();

    if (options.animation === undefined) {
      recorder.captureFrame();
    } else {
      recorder.recordAnimation(findAnimation(document, options.animation));
    }
    return recorder.genBvh();
  }

  /**
   * Apply BVH text to a glTF rig as a new animation
   *
   * Motion without frames adds no animation.
   *
   * @returns the rig document with the animation added
   */
  async load(bvh: string, rig: RigInput, options: LoadOptions = {}): Promise<Document> {
    const document = await GltfParserFactory.parse(rig);
    const loader = new BvhAnimationLoader({
      convention: this.config.convention,
      respectBvhTime: this.config.respectBvhTime,
      frameRate: this.config.frameRate,
      flexibleBoneNames: this.config.flexibleBoneNames,
      boneRenamingMap: this.config.boneRenamingMap,
      clipName: options.clipName,
      debug: this.config.debug,
    });

    loader.parse(bvh);
    const animation = loader.loadAnimation(document, { rigNode: findNode(document, options.rigNode, 'rig') });
    if (animation.listChannels().length === 0) {
      this.logger.warn(`Animation "${animation.getName()}" has no keys and was dropped`, { frameCount: loader.bvh?.frameCount });
      animation.dispose();
    }
    return await postprocessGltfDocument(document, { resample: this.config.resample }, this.logger);
  }

  /**
   * Apply BVH text to a glTF rig and return the result as GLB bytes
   */
  async loadToGlb(bvh: string, rig: RigInput, options: LoadOptions = {}): Promise<Uint8Array> {
    return await writeGlb(await this.load(bvh, rig, options));
  }

  /**
   * Get current configuration
   */
  getConfig(): BvhToolkitConfig {
    return { ...this.config };
  }

  private frameTimeOverride(): number | undefined {
    return this.config.respectBvhTime ? undefined : 1 / this.config.frameRate;
  }
}

/**
 * Create toolkit instance with configuration
 *
 * @example
 * ```typescript
 * import { defineConfig } from 'bvh-motion-toolkit';
 *
 * const bvh = defineConfig({ convention: 'standard', precision: 'low' });
 * const document = bvh.parse(text);
 * ```
 */
export function defineConfig(config: BvhToolkitConfigInput = {}): BvhToolkit {
  return new BvhToolkit(config);
}

/**
 * TypeScript type exports
 */
export type * from './types';

/**
 * Direct API exports
 */
export { parseBvh, parseBvhFile } from './converters/parsers/bvh-parser';
export { serializeBvh, formatHierarchy, encodeFrame, formatMotion } from './converters/bvh-serializer';
export { decodeBvh } from './converters/curve-decoder';
export { BvhRecorder } from './converters/bvh-recorder';
export type { RecorderRig } from './converters/bvh-recorder';
export { BvhAnimationLoader } from './converters/bvh-animation-loader';
export { GltfCurveWriter, ensureQuaternionContinuity } from './converters/helpers/gltf-curve-writer';
export { NameResolver } from './converters/helpers/name-resolver';
export { createGltfRigView } from './converters/helpers/gltf-rig';
export { buildSkeleton, captureSnapshot, detectBones, getRootBone } from './converters/helpers/skeleton-builder';
export { sampleAnimation } from './converters/helpers/pose-sampler';
export { GltfParserFactory, writeGlb } from './converters/parsers/gltf-parser-factory';
export type { RigInput } from './converters/parsers/gltf-parser-factory';
export {
  ChannelKind,
  CHANNEL_NAMES,
  flattenJoints,
  findJoint,
  getFrameRate,
  getDuration,
} from './core/bvh-document';
export {
  quaternionToEulerZXY,
  eulerZXYToQuaternion,
  toBvhRotation,
  fromBvhRotation,
  toBvhOffset,
  fromBvhOffset,
  wrapAngle,
} from './core/coordinate-convention';
export { createSkeleton } from './core/skeleton';
export { BvhScanner } from './core/scanner';
export * from './errors';
export { LoggerFactory, LogLevel, createLogger } from './utils/logger';

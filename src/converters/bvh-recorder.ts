/**
 * BVH Recorder
 *
 * Capture session over a glTF rig. The usual sequence is:
 *
 *   detectBones -> buildSkeleton -> genHierarchy -> captureFrame / recordAnimation -> genBvh / saveBvh
 *
 * Each step checks that the previous one ran and raises BvhStateError
 * otherwise. Capturing only reads node transforms.
 */

import * as path from 'path';
import { Animation, Document, Node } from '@gltf-transform/core';
import { ERROR_MESSAGES } from '../constants/errors';
import type { PoseSnapshot, Skeleton } from '../core/skeleton';
import { BvhErrorFactory } from '../errors';
import { RecorderOptions, RecorderOptionsInput, RecorderOptionsSchema } from '../schemas';
import { ensureBvhExtension, timestampFileName, uniquePath } from '../utils/file-utils';
import { Logger, LoggerFactory } from '../utils/logger';
import { validateConfig } from '../validation';
import { encodeFrame, formatHierarchy, formatMotion } from './bvh-serializer';
import type { PoseOverrides } from './helpers/gltf-rig';
import { sampleAnimation } from './helpers/pose-sampler';
import { buildSkeleton, captureSnapshot, detectBones } from './helpers/skeleton-builder';

/**
 * The rig a recorder reads from
 */
export interface RecorderRig {
  document: Document;
  /** Node carrying the rig's placement and scale */
  rigNode?: Node | null;
  /** Restricts bone detection to joints below this node */
  rootBone?: Node | null;
  /** Names to write instead of node names */
  boneNames?: ReadonlyMap<Node, string>;
}

export class BvhRecorder {
  readonly options: RecorderOptions;
  /** Bones the skeleton is built from; filled by detectBones or set directly */
  bones: Node[] = [];
  /** Path of the last file written by saveBvh */
  lastSavedFile = '';

  private readonly rig: RecorderRig;
  private readonly logger: Logger;
  private skeleton: Skeleton<Node> | null = null;
  private hierarchy: string | null = null;
  private frames: string[] = [];

  constructor(rig: RecorderRig, options: RecorderOptionsInput = {}) {
    this.rig = rig;
    this.options = validateConfig(RecorderOptionsSchema, options, 'RecorderOptions');
    this.logger = LoggerFactory.forRecorder(this.options.debug);
  }

  /**
   * Collects the joints of every skin, sorted by name.
   */
  detectBones(): Node[] {
    this.bones = detectBones(this.rig.document, { rootBone: this.rig.rootBone });
    this.logger.debug(`Detected ${this.bones.length} bones`);
    return this.bones;
  }

  /**
   * Builds the joint tree from `bones`. Discards any hierarchy and frames.
   */
  buildSkeleton(): Skeleton<Node> {
    this.skeleton = buildSkeleton({
      bones: this.bones,
      rigNode: this.rig.rigNode,
      boneNames: this.rig.boneNames,
    });
    this.hierarchy = null;
    this.frames = [];
    this.logger.info(`Built skeleton with ${this.skeleton.joints.length} joints`, {
      jointName: this.skeleton.root.name
    });
    return this.skeleton;
  }

  /**
   * Writes the HIERARCHY section and starts a new capture.
   */
  genHierarchy(): string {
    const skeleton = this.requireSkeleton('genHierarchy');
    this.hierarchy = formatHierarchy(skeleton, this.options);
    this.frames = [];
    return this.hierarchy;
  }

  /**
   * Reads the current pose without encoding it.
   */
  captureSnapshot(overrides?: PoseOverrides): PoseSnapshot {
    return captureSnapshot(this.requireSkeleton('captureSnapshot'), overrides);
  }

  /**
   * Appends the current pose as a motion frame.
   */
  captureFrame(overrides?: PoseOverrides): void {
    const skeleton = this.requireHierarchy('captureFrame');
    this.frames.push(encodeFrame(skeleton, captureSnapshot(skeleton, overrides), this.options));
  }

  /**
   * Appends one frame per time step of an animation, sampled at the
   * recorder's frame rate from time 0 through its last keyframe.
   *
   * @returns number of frames added
   */
  recordAnimation(animation: Animation): number {
    this.requireHierarchy('recordAnimation');
    const poses = sampleAnimation(animation, this.options.frameRate);
    for (const pose of poses) {
      this.captureFrame(pose.overrides);
    }
    this.logger.info(`Recorded animation "${animation.getName()}"`, { frameCount: poses.length });
    return poses.length;
  }

  clearCapture(): void {
    this.frames = [];
  }

  get frameCount(): number {
    return this.frames.length;
  }

  /**
   * Complete BVH text of the capture so far.
   */
  genBvh(): string {
    const hierarchy = this.hierarchy;
    if (hierarchy === null) {
      throw BvhErrorFactory.stateError(ERROR_MESSAGES.NO_HIERARCHY, 'genBvh');
    }
    return hierarchy + formatMotion(this.frames, this.options.frameRate);
  }

  /**
   * Writes the capture to disk.
   *
   * Without a name a timestamped one is used. The name gets a .bvh
   * extension when missing and is placed in the configured directory.
   * Unless `overwrite` is set an existing file is kept and ' (n)' is added
   * to the new name.
   *
   * @returns the path written
   */
  async saveBvh(fileName?: string): Promise<string> {
    const content = this.genBvh();
    const outputName = fileName ? ensureBvhExtension(fileName) : timestampFileName();
    let outputFile = path.join(this.options.directory, outputName);
    if (!this.options.overwrite) {
      outputFile = uniquePath(outputFile);
    }

    const fs = await import('fs');
    try {
      await fs.promises.writeFile(outputFile, content, 'utf8');
    } catch (error) {
      throw BvhErrorFactory.fileSystemError(
        `Failed to write BVH file: ${error instanceof Error ? error.message : String(error)}`,
        outputFile,
        'write'
      );
    }

    this.lastSavedFile = outputFile;
    this.logger.logFileOperation('write', outputFile, content.length);
    return outputFile;
  }

  private requireSkeleton(operation: string): Skeleton<Node> {
    if (!this.skeleton) {
      throw BvhErrorFactory.stateError(ERROR_MESSAGES.NO_SKELETON, operation);
    }
    return this.skeleton;
  }

  private requireHierarchy(operation: string): Skeleton<Node> {
    if (!this.skeleton || this.hierarchy === null) {
      throw BvhErrorFactory.stateError(ERROR_MESSAGES.NO_HIERARCHY, operation);
    }
    return this.skeleton;
  }
}

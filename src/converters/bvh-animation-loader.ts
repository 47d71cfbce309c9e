/**
 * BVH Animation Loader
 *
 * Parses BVH motion and applies it to a glTF rig as a new animation.
 * Parsing touches no rig and may run ahead of loading.
 */

import { Animation, Document, Node } from '@gltf-transform/core';
import type { BvhDocument } from '../core/bvh-document';
import { ERROR_MESSAGES } from '../constants/errors';
import { BvhErrorFactory } from '../errors';
import { LoaderOptions, LoaderOptionsInput, LoaderOptionsSchema } from '../schemas';
import { Logger, LoggerFactory } from '../utils/logger';
import { validateConfig } from '../validation';
import { decodeBvh } from './curve-decoder';
import { createGltfRigView } from './helpers/gltf-rig';
import { GltfCurveWriter } from './helpers/gltf-curve-writer';
import { NameResolver } from './helpers/name-resolver';
import { detectBones, getRootBone } from './helpers/skeleton-builder';
import { parseBvh, parseBvhFile } from './parsers/bvh-parser';

export interface LoadAnimationOptions {
  /** Node the motion is applied under; the whole scene when omitted */
  rigNode?: Node | null;
}

let clipCount = 0;

export class BvhAnimationLoader {
  readonly options: LoaderOptions;
  /** Frames per second of the loaded motion */
  frameRate: number;

  private readonly logger: Logger;
  private document: BvhDocument | null = null;

  constructor(options: LoaderOptionsInput = {}) {
    this.options = validateConfig(LoaderOptionsSchema, options, 'LoaderOptions');
    this.frameRate = this.options.frameRate;
    this.logger = LoggerFactory.forLoader(this.options.debug);
  }

  /**
   * The last parsed document, or null before parse
   */
  get bvh(): BvhDocument | null {
    return this.document;
  }

  /**
   * Parses BVH text. With `respectBvhTime` the file's Frame Time sets the
   * frame rate, otherwise the configured frame rate replaces it.
   */
  parse(text: string): BvhDocument {
    const frameTimeOverride = this.options.respectBvhTime ? undefined : 1 / this.options.frameRate;
    return this.accept(parseBvh(text, { debug: this.options.debug, frameTimeOverride }));
  }

  async parseFile(filePath: string): Promise<BvhDocument> {
    const frameTimeOverride = this.options.respectBvhTime ? undefined : 1 / this.options.frameRate;
    this.logger.logFileOperation('read', filePath);
    return this.accept(await parseBvhFile(filePath, { debug: this.options.debug, frameTimeOverride }));
  }

  private accept(document: BvhDocument): BvhDocument {
    this.document = document;
    this.frameRate = 1 / document.frameTime;
    this.logger.debug(`Parsed ${document.joints.length} joints`, { frameCount: document.frameCount });
    return document;
  }

  /**
   * Adds the parsed motion to a glTF document as a new animation.
   *
   * The BVH root is looked up breadth-first from the rig node; when no node
   * matches, the topmost skin joint is used instead.
   *
   * @throws BvhStateError when nothing has been parsed or no root bone exists
   * @throws BvhNameResolutionError when a joint has no matching node
   */
  loadAnimation(gltf: Document, options: LoadAnimationOptions = {}): Animation {
    const bvh = this.document;
    if (!bvh) {
      throw BvhErrorFactory.stateError(ERROR_MESSAGES.NO_DOCUMENT, 'loadAnimation');
    }

    const rigNode = options.rigNode ?? null;
    const rig = createGltfRigView(gltf, rigNode);
    const resolver = new NameResolver(rig, {
      flexibleNames: this.options.flexibleBoneNames,
      renames: this.options.boneRenamingMap,
    });

    let rootNode = resolver.resolveRoot(bvh.root.name);
    if (!rootNode) {
      rootNode = getRootBone(detectBones(gltf, { rootBone: rigNode }));
      if (!rootNode) {
        throw BvhErrorFactory.stateError(`No root bone "${bvh.root.name}" found.`, 'loadAnimation');
      }
      this.logger.warn(`Using "${rootNode.getName()}" as the root bone.`, { jointName: rootNode.getName() });
    }

    const name = this.options.clipName || `BVHClip (${clipCount++})`;
    const curves = decodeBvh(bvh, rig, {
      rootNode,
      convention: this.options.convention,
      frameTime: bvh.frameTime,
      resolver,
      logger: this.logger,
    });

    const animation = new GltfCurveWriter(gltf).write(curves, { name, logger: this.logger });
    this.logger.info(`Loaded animation "${name}"`, { frameCount: bvh.frameCount, jointName: rootNode.getName() });
    return animation;
  }
}

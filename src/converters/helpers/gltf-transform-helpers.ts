/**
 * GLTF Transform Helpers
 *
 * Cleanup passes from @gltf-transform/functions applied to a document
 * after BVH motion has been written into it.
 */

import { Document } from '@gltf-transform/core';
import { resample } from '@gltf-transform/functions';
import { Logger } from '../../utils/logger';

/**
 * Options for postprocessing a document with new animations
 */
export interface GltfPostprocessOptions {
  /**
   * Resample animations, removing keyframes that linear interpolation
   * reproduces anyway.
   *
   * @default false
   */
  resample?: boolean;
}

/**
 * Applies the selected passes in place and returns the document.
 */
export async function postprocessGltfDocument(
  document: Document,
  options: GltfPostprocessOptions,
  logger: Logger
): Promise<Document> {
  const { resample: shouldResample = false } = options;

  if (shouldResample) {
    logger.info('Resampling animations', {
      stage: 'postprocessing',
      operation: 'resample'
    });
    await document.transform(resample());
  }

  return document;
}

/**
 * BVH Parser
 *
 * Parses BVH text into a BvhDocument in a single synchronous pass.
 * Nothing here touches a rig, so parsing can run away from whatever owns
 * the scene.
 *
 * @see https://research.cs.wisc.edu/graphics/Courses/cs-838-1999/Jeff/BVH.html
 */

import { BvhDocument, flattenJoints } from '../../core/bvh-document';
import { parseHierarchy } from '../../core/hierarchy-parser';
import { parseMotion } from '../../core/motion-parser';
import { BvhScanner } from '../../core/scanner';
import { BvhErrorFactory } from '../../errors';
import { Logger, LogLevel } from '../../utils/logger';

/**
 * BVH Parser Configuration
 */
export interface BvhParserConfig {
  /** Enable debug logging */
  debug?: boolean;

  /** Seconds per frame to use instead of the file's Frame Time */
  frameTimeOverride?: number;

  /** Logger to report to; a quiet one is created when omitted */
  logger?: Logger;
}

/**
 * Parse BVH text
 *
 * @throws BvhParseError when the text does not follow the BVH grammar
 */
export function parseBvh(text: string, config: BvhParserConfig = {}): BvhDocument {
  const logger = config.logger ?? new Logger({ level: config.debug ? LogLevel.DEBUG : LogLevel.ERROR });

  return logger.timed('parseBvh', () => {
    const scanner = new BvhScanner(text);
    const hierarchy = parseHierarchy(scanner);

    logger.debug(`Parsed hierarchy: ${flattenJoints(hierarchy).length} joints`, {
      stage: 'hierarchy',
      rootName: hierarchy.name
    });

    const document = parseMotion(scanner, hierarchy, { frameTimeOverride: config.frameTimeOverride });

    logger.debug(`Parsed motion: ${document.frameCount} frames at ${document.frameTime}s`, {
      stage: 'motion',
      frameCount: document.frameCount
    });

    return document;
  }, { length: text.length });
}

/**
 * Parse BVH file from file path (Node.js only)
 */
export async function parseBvhFile(filePath: string, config: BvhParserConfig = {}): Promise<BvhDocument> {
  const fs = await import('fs');
  let text: string;
  try {
    text = await fs.promises.readFile(filePath, 'utf8');
  } catch (error) {
    throw BvhErrorFactory.fileSystemError(
      `Failed to read BVH file: ${error instanceof Error ? error.message : String(error)}`,
      filePath,
      'read'
    );
  }
  return parseBvh(text, config);
}

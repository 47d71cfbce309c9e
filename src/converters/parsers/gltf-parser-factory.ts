/**
 * GLTF Parser Factory
 *
 * Factory pattern for selecting the rig reader based on input type.
 */

import { Document, NodeIO } from '@gltf-transform/core';
import { ALL_EXTENSIONS } from '@gltf-transform/extensions';
import { BvhErrorFactory } from '../../errors';

/**
 * Rig input: file path, GLB bytes, or an already loaded document
 */
export type RigInput = string | ArrayBuffer | Uint8Array | Document;

/**
 * Parser interface
 */
export interface IGltfParser {
  parse(input: string | ArrayBuffer | Uint8Array): Promise<Document>;
  getType(): string;
}

/**
 * NodeIO with every extension glTF Transform ships registered
 */
export function createNodeIO(): NodeIO {
  return new NodeIO().registerExtensions(ALL_EXTENSIONS);
}

/**
 * GLB Parser - handles binary GLB data
 */
class GlbParser implements IGltfParser {
  private io = createNodeIO();

  async parse(input: string | ArrayBuffer | Uint8Array): Promise<Document> {
    if (typeof input === 'string') {
      throw BvhErrorFactory.fileSystemError('GlbParser expects binary data, received a path', input, 'read');
    }
    return await this.io.readBinary(input instanceof Uint8Array ? input : new Uint8Array(input));
  }

  getType(): string {
    return 'GLB';
  }
}

/**
 * GLTF Parser - handles .gltf and .glb files on disk, external resources included
 */
class GltfFileParser implements IGltfParser {
  private io = createNodeIO();

  async parse(input: string | ArrayBuffer | Uint8Array): Promise<Document> {
    if (typeof input !== 'string') {
      throw BvhErrorFactory.fileSystemError('GltfFileParser expects a file path', '', 'read');
    }
    try {
      return await this.io.read(input);
    } catch (error) {
      throw BvhErrorFactory.fileSystemError(
        `Failed to read glTF file: ${error instanceof Error ? error.message : String(error)}`,
        input,
        'read'
      );
    }
  }

  getType(): string {
    return 'GLTF';
  }
}

/**
 * Parser Factory
 */
export class GltfParserFactory {
  /**
   * Creates appropriate parser based on input type
   */
  static createParser(input: string | ArrayBuffer | Uint8Array): IGltfParser {
    if (typeof input === 'string') {
      return new GltfFileParser();
    }
    return new GlbParser();
  }

  /**
   * Loads a rig; documents are returned as they are
   */
  static async parse(input: RigInput): Promise<Document> {
    if (input instanceof Document) {
      return input;
    }
    const parser = this.createParser(input);
    return await parser.parse(input);
  }
}

/**
 * Serializes a document as GLB bytes
 */
export async function writeGlb(document: Document): Promise<Uint8Array> {
  return await createNodeIO().writeBinary(document);
}

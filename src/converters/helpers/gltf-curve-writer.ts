/**
 * glTF Curve Writer
 *
 * Stores decoded curves as a glTF animation. Position curves of a node
 * become one `translation` channel, rotation curves one `rotation` channel,
 * each with a LINEAR sampler. All accessors share one buffer.
 */

import { Animation, Buffer, Document, Node } from '@gltf-transform/core';
import type { Curve, CurveKey, CurveProperty } from '../curve-decoder';
import { Quat, quatDot } from '../../utils/quaternion-utils';
import { Logger } from '../../utils/logger';

export interface CurveWriterOptions {
  /** Animation name */
  name: string;
  /** Buffer for the new accessors; the document's first buffer or a new one when omitted */
  buffer?: Buffer;
  logger?: Logger;
}

type NodeCurves = Partial<Record<CurveProperty, CurveKey[]>>;

/**
 * Negates every quaternion key whose dot product with the previous key is
 * negative, so interpolation follows the shorter arc. Works in place.
 */
export function ensureQuaternionContinuity(rotations: Quat[]): Quat[] {
  for (let i = 1; i < rotations.length; i++) {
    if (quatDot(rotations[i - 1], rotations[i]) < 0) {
      const [x, y, z, w] = rotations[i];
      rotations[i] = [-x, -y, -z, -w];
    }
  }
  return rotations;
}

function groupByNode(curves: readonly Curve<Node>[]): Map<Node, NodeCurves> {
  const groups = new Map<Node, NodeCurves>();
  for (const curve of curves) {
    const group: NodeCurves = groups.get(curve.target) ?? {};
    group[curve.property] = curve.keys;
    groups.set(curve.target, group);
  }
  return groups;
}

export class GltfCurveWriter {
  constructor(private document: Document) { }

  /**
   * Adds a new animation built from the curves. Nodes with an incomplete
   * or keyless position or rotation group get no channel for that group.
   */
  write(curves: readonly Curve<Node>[], options: CurveWriterOptions): Animation {
    const root = this.document.getRoot();
    const buffer = options.buffer ?? root.listBuffers()[0] ?? this.document.createBuffer();
    const animation = this.document.createAnimation(options.name);

    for (const [node, group] of groupByNode(curves)) {
      const { 'position.x': px, 'position.y': py, 'position.z': pz } = group;
      if (px && px.length === 0) {
        options.logger?.warn(`Empty position curves for "${node.getName()}" skipped`, { jointName: node.getName() });
      } else if (px && py && pz) {
        const values = new Float32Array(px.length * 3);
        px.forEach((key, i) => {
          values[i * 3] = key.value;
          values[i * 3 + 1] = py[i].value;
          values[i * 3 + 2] = pz[i].value;
        });
        this.addChannel(animation, buffer, node, 'translation', px, values);
      } else if (px || py || pz) {
        options.logger?.warn(`Incomplete position curves for "${node.getName()}" skipped`, { jointName: node.getName() });
      }

      const { 'rotation.x': rx, 'rotation.y': ry, 'rotation.z': rz, 'rotation.w': rw } = group;
      if (rx && rx.length === 0) {
        options.logger?.warn(`Empty rotation curves for "${node.getName()}" skipped`, { jointName: node.getName() });
      } else if (rx && ry && rz && rw) {
        const rotations = ensureQuaternionContinuity(
          rx.map((key, i): Quat => [key.value, ry[i].value, rz[i].value, rw[i].value])
        );
        this.addChannel(animation, buffer, node, 'rotation', rx, new Float32Array(rotations.flat()));
      } else if (rx || ry || rz || rw) {
        options.logger?.warn(`Incomplete rotation curves for "${node.getName()}" skipped`, { jointName: node.getName() });
      }
    }

    options.logger?.debug(`Wrote animation "${options.name}" with ${animation.listChannels().length} channels`);
    return animation;
  }

  private addChannel(
    animation: Animation,
    buffer: Buffer,
    node: Node,
    path: 'translation' | 'rotation',
    keys: readonly CurveKey[],
    values: Float32Array
  ): void {
    const input = this.document.createAccessor()
      .setType('SCALAR')
      .setArray(new Float32Array(keys.map(key => key.time)))
      .setBuffer(buffer);
    const output = this.document.createAccessor()
      .setType(path === 'translation' ? 'VEC3' : 'VEC4')
      .setArray(values)
      .setBuffer(buffer);

    const sampler = this.document.createAnimationSampler()
      .setInput(input)
      .setOutput(output)
      .setInterpolation('LINEAR');
    const channel = this.document.createAnimationChannel()
      .setTargetNode(node)
      .setTargetPath(path)
      .setSampler(sampler);

    animation.addSampler(sampler).addChannel(channel);
  }
}

/**
 * Name Resolver
 *
 * Maps BVH joint names to rig nodes. Names are compared in their flexible
 * form when enabled, and a rename table can redirect a BVH name to a
 * different rig name.
 */

import type { RigView } from '../../core/rig-view';
import { BvhErrorFactory } from '../../errors';
import { normalizeJointName } from '../../utils/name-utils';

export interface NameResolverOptions {
  flexibleNames?: boolean;
  /** BVH joint name to rig node name */
  renames?: Readonly<Record<string, string>>;
}

export class NameResolver<TNode> {
  private readonly flexible: boolean;
  private readonly renames = new Map<string, string>();

  constructor(
    private readonly rig: RigView<TNode>,
    options: NameResolverOptions = {}
  ) {
    this.flexible = options.flexibleNames ?? true;
    for (const [bvhName, targetName] of Object.entries(options.renames ?? {})) {
      if (bvhName !== '' && targetName !== '') {
        this.renames.set(this.normalize(bvhName), this.normalize(targetName));
      }
    }
  }

  private normalize(name: string): string {
    return normalizeJointName(name, this.flexible);
  }

  /**
   * Normalized rig name a BVH joint name should match
   */
  targetName(bvhName: string): string {
    const name = this.normalize(bvhName);
    return this.renames.get(name) ?? name;
  }

  matches(node: TNode, bvhName: string): boolean {
    return this.normalize(this.rig.getName(node)) === this.targetName(bvhName);
  }

  /**
   * Breadth-first search from the rig's entry nodes. Null when nothing matches.
   */
  resolveRoot(bvhName: string): TNode | null {
    const queue: TNode[] = [...this.rig.entryNodes];
    for (let i = 0; i < queue.length; i++) {
      const node = queue[i];
      if (this.matches(node, bvhName)) {
        return node;
      }
      queue.push(...this.rig.getChildren(node));
    }
    return null;
  }

  /**
   * Finds a BVH joint among the direct children of `parent`.
   *
   * @throws BvhNameResolutionError when no node matches
   */
  resolveChild(bvhName: string, parent: TNode): TNode {
    for (const child of this.rig.getChildren(parent)) {
      if (this.matches(child, bvhName)) {
        return child;
      }
    }
    const parentName = this.rig.getName(parent);
    throw BvhErrorFactory.nameResolutionError(
      `Could not find bone "${bvhName}" under bone "${parentName}".`,
      bvhName,
      parentName
    );
  }
}

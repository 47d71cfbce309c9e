/**
 * Name Utilities
 *
 * Joint name normalization shared by the recorder and the loader.
 */

/**
 * Loose form of a joint name: spaces and underscores removed, lower case.
 * Example: 'Left_Upper Arm' -> 'leftupperarm'
 */
export function flexibleName(name: string): string {
  return name.replace(/[ _]/g, '').toLowerCase();
}

/**
 * Normalizes a name for comparison, loosely or exactly.
 */
export function normalizeJointName(name: string, flexible: boolean): string {
  return flexible ? flexibleName(name) : name;
}

/**
 * Produces a joint name usable in a BVH hierarchy.
 * BVH joint names run to the end of their line, so line breaks are replaced
 * and an empty name gets a placeholder.
 */
export function sanitizeJointName(name: string, fallback: string = 'Joint'): string {
  const sanitized = name.replace(/[\r\n]+/g, ' ').trim();
  return sanitized || fallback;
}

/**
 * Error Constants for the BVH toolkit
 */

/**
 * Error Codes
 */
export const ERROR_CODES = {
  PARSE_ERROR: 'BVH_PARSE_ERROR',
  NUMERIC_PARSE_ERROR: 'BVH_NUMERIC_PARSE_ERROR',
  NAME_RESOLUTION_ERROR: 'BVH_NAME_RESOLUTION_ERROR',
  STATE_ERROR: 'BVH_STATE_ERROR',
  CONFIG_VALIDATION_ERROR: 'BVH_CONFIG_VALIDATION_ERROR',
  FILE_SYSTEM_ERROR: 'BVH_FILE_SYSTEM_ERROR',
} as const;

/**
 * Error Messages
 */
export const ERROR_MESSAGES = {
  NO_SKELETON: 'Skeleton not initialized. You can initialize the skeleton by calling buildSkeleton().',
  NO_HIERARCHY: 'Hierarchy not initialized. You can initialize the hierarchy by calling genHierarchy().',
  NO_BONES: 'The bones list has to be set before calling buildSkeleton(). You can initialize the bones list by calling detectBones().',
  NO_ROOT_BONE: 'No root bone found.',
  NO_DOCUMENT: 'No BVH file has been parsed.',
  INVALID_CONFIG: 'Invalid configuration',
} as const;

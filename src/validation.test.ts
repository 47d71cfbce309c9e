import { describe, expect, it } from 'vitest';
import { BvhConfigError } from './errors';
import { LoaderOptionsSchema, RecorderOptionsSchema } from './schemas';
import { validateConfig } from './validation';

describe('validateConfig', () => {
  it('fills in defaults', () => {
    expect(validateConfig(RecorderOptionsSchema, {}, 'RecorderOptions')).toEqual({
      frameRate: 60,
      convention: 'blender',
      precision: 'high',
      overwrite: false,
      directory: '',
      debug: false,
    });
  });

  it('keeps given values', () => {
    const options = validateConfig(LoaderOptionsSchema, { convention: 'standard', boneRenamingMap: { Pelvis: 'Hips' } }, 'LoaderOptions');
    expect(options.convention).toBe('standard');
    expect(options.boneRenamingMap).toEqual({ Pelvis: 'Hips' });
    expect(options.respectBvhTime).toBe(true);
  });

  it('reports every failing field', () => {
    let caught: unknown;
    try {
      validateConfig(RecorderOptionsSchema, { frameRate: 0, precision: 'medium' }, 'RecorderOptions');
    } catch (error) {
      caught = error;
    }

    expect(caught).toBeInstanceOf(BvhConfigError);
    if (caught instanceof BvhConfigError) {
      expect(caught.configKey).toBe('RecorderOptions');
      expect(caught.getValidationIssues().map(issue => issue.path.join('.'))).toEqual(['frameRate', 'precision']);
      expect(caught.message.startsWith('Invalid configuration: frameRate: Frame rate must be greater than zero; precision: ')).toBe(true);
    }
  });
});

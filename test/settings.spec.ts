import * as fs from 'fs/promises';
import * as path from 'path';
import { describe, it, expect, beforeEach } from 'vitest';
import { loadSettings } from '../src/settings';
import { SettingsError } from '../src/errors';
import { makeTempDir } from './helpers';

describe('loadSettings', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await makeTempDir();
  });

  it('falls back to defaults', () => {
    expect(loadSettings()).toEqual({
      inkscapePath: 'inkscape',
      inkscapeCli: 'legacy',
      strokeColor: '#ff0000',
      strokeWidth: 0.07559055,
      checkExitCode: true,
      logLevel: 'info',
    });
  });

  it('reads a JSON settings file', async () => {
    const file = path.join(dir, 'settings.json');
    await fs.writeFile(file, JSON.stringify({ inkscapePath: '/usr/local/bin/inkscape', strokeWidth: 0.1 }));

    const settings = loadSettings({ file });

    expect(settings.inkscapePath).toBe('/usr/local/bin/inkscape');
    expect(settings.strokeWidth).toBe(0.1);
    expect(settings.strokeColor).toBe('#ff0000');
  });

  it('lets the environment override the file and overrides win over both', async () => {
    const file = path.join(dir, 'settings.json');
    await fs.writeFile(file, JSON.stringify({ strokeColor: '#111111', inkscapeCli: 'modern' }));
    const env = {
      LASERPREP_STROKE_COLOR: '#222222',
      LASERPREP_STROKE_WIDTH: '0.2',
      LASERPREP_CHECK_EXIT_CODE: 'false',
      LASERPREP_LOG_LEVEL: 'debug',
    };

    const settings = loadSettings({ file, env, overrides: { strokeWidth: '0.3', logLevel: undefined } });

    expect(settings).toEqual({
      inkscapePath: 'inkscape',
      inkscapeCli: 'modern',
      strokeColor: '#222222',
      strokeWidth: 0.3,
      checkExitCode: false,
      logLevel: 'debug',
    });
  });

  it('ignores blank environment values', () => {
    expect(loadSettings({ env: { LASERPREP_INKSCAPE: '  ' } }).inkscapePath).toBe('inkscape');
  });

  it('rejects a non-positive stroke width', () => {
    expect(() => loadSettings({ overrides: { strokeWidth: '-1' } })).toThrow(SettingsError);
    expect(() => loadSettings({ overrides: { strokeWidth: 'wide' } })).toThrow(/strokeWidth/);
  });

  it('rejects a stroke color that would break the style attribute', () => {
    expect(() => loadSettings({ overrides: { strokeColor: '#ff0000;stroke-width:9' } })).toThrow(
      'Invalid settings: strokeColor: must not contain ";"',
    );
  });

  it('rejects an unknown command-line dialect', () => {
    expect(() => loadSettings({ env: { LASERPREP_INKSCAPE_CLI: 'v0' } })).toThrow(/inkscapeCli/);
  });

  it('rejects an unparseable boolean', () => {
    expect(() => loadSettings({ env: { LASERPREP_CHECK_EXIT_CODE: 'maybe' } })).toThrow(
      'Invalid boolean for LASERPREP_CHECK_EXIT_CODE: "maybe"',
    );
  });

  it('rejects a settings file that is missing or not an object', async () => {
    const file = path.join(dir, 'list.json');
    await fs.writeFile(file, '[1, 2]');

    expect(() => loadSettings({ file: path.join(dir, 'absent.json') })).toThrow(SettingsError);
    expect(() => loadSettings({ file })).toThrow(`Settings file ${file} must contain a JSON object`);
  });
});

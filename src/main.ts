import { Command, Option } from 'commander';
import type { Logger } from 'pino';
import type { VectorConverter } from './types';
import { InkscapeConverter } from './converter';
import { createLogger, LOG_LEVELS } from './logger';
import { processInput } from './preprocess';
import { loadSettings, type Settings } from './settings';

type CliOptions = {
  output?: string;
  strokeColor?: string;
  strokeWidth?: string;
  inkscape?: string;
  inkscapeCli?: string;
  ignoreExitCode?: boolean;
  config?: string;
  logLevel?: string;
};

export type ProgramDeps = {
  env?: NodeJS.ProcessEnv;
  createLogger?: (settings: Settings) => Logger;
  createConverter?: (settings: Settings, logger: Logger) => VectorConverter;
};

export function createProgram(deps: ProgramDeps = {}): Command {
  const {
    env = process.env,
    createLogger: makeLogger = (settings) => createLogger(settings.logLevel),
    createConverter = (settings, logger) =>
      new InkscapeConverter({ program: settings.inkscapePath, cliStyle: settings.inkscapeCli, logger }),
  } = deps;

  const program = new Command();

  program
    .name('dxf-laser-prep')
    .description('Preprocess a CAD DXF drawing export for laser cutting.')
    .argument('<input>', 'Path to the DXF file to preprocess, or to a directory of DXF files to preprocess.')
    .option(
      '-o, --output <path>',
      'Output SVG file, or the directory to write it in. Default: the input path with .dxf replaced by .svg, '
        + 'or the input directory for a directory input.',
    )
    .option('--stroke-color <color>', 'Stroke color given to laser-cut paths (default: #ff0000)')
    .option('--stroke-width <px>', 'Stroke width of laser-cut paths, in pixels at 96 per inch (default: 0.07559055)')
    .option('--inkscape <program>', 'Inkscape executable (default: inkscape)')
    .addOption(new Option('--inkscape-cli <style>', 'Inkscape command-line dialect').choices(['legacy', 'modern']))
    .option('--ignore-exit-code', 'Style the SVG even when Inkscape exits with an error')
    .option('-c, --config <file>', 'JSON settings file')
    .addOption(new Option('--log-level <level>', 'Log level').choices([...LOG_LEVELS]))
    .action(async (input: string, options: CliOptions) => {
      const settings = loadSettings({
        file: options.config,
        env,
        overrides: {
          strokeColor: options.strokeColor,
          strokeWidth: options.strokeWidth,
          inkscapePath: options.inkscape,
          inkscapeCli: options.inkscapeCli,
          checkExitCode: options.ignoreExitCode ? false : undefined,
          logLevel: options.logLevel,
        },
      });
      const logger = makeLogger(settings);

      await processInput(input, options.output, {
        converter: createConverter(settings, logger),
        logger,
        strokeStyle: { color: settings.strokeColor, width: settings.strokeWidth },
        checkExitCode: settings.checkExitCode,
      });
    });

  return program;
}

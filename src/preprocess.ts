import * as fs from 'fs/promises';
import * as path from 'path';
import type { Logger } from 'pino';
import type { StrokeStyle, VectorConverter } from './types';
import { ConversionError, FileTypeError } from './errors';
import { deriveSvgName, fileExtension } from './pathUtils';
import { DEFAULT_STROKE_STYLE, styleStrokes } from './svgStyler';

export type PreprocessContext = {
  converter: VectorConverter;
  logger: Logger;
  strokeStyle?: StrokeStyle;
  /** When false, a failed conversion is logged and styling still runs on whatever was written. */
  checkExitCode?: boolean;
};

export function resolveSvgPath(dxfPath: string, svgPath?: string): string {
  if (svgPath === undefined) {
    return path.join(path.dirname(dxfPath), deriveSvgName(dxfPath));
  }
  if (!fileExtension(svgPath)) {
    return path.join(svgPath, deriveSvgName(dxfPath));
  }
  return svgPath;
}

/**
 * Converts one DXF file to SVG and restyles its black outlines for laser cutting.
 *
 * @param svgPath - output file, or the directory to put `<name>.svg` in.
 *   Defaults to the DXF's own directory.
 * @returns the path of the SVG written
 * @throws FileTypeError if `dxfPath` does not end in `.dxf`
 */
export async function preprocess(dxfPath: string, svgPath: string | undefined, context: PreprocessContext): Promise<string> {
  const { converter, logger, strokeStyle = DEFAULT_STROKE_STYLE, checkExitCode = true } = context;

  const dxfExt = fileExtension(dxfPath);
  if (dxfExt !== '.dxf') {
    throw new FileTypeError(dxfExt, dxfPath);
  }

  const outputPath = resolveSvgPath(dxfPath, svgPath);
  await fs.mkdir(path.dirname(outputPath), { recursive: true });

  const result = await converter.convert(dxfPath, outputPath);
  if (result.status === 'error') {
    if (checkExitCode) {
      throw new ConversionError(dxfPath, outputPath, result.exitCode, result.message);
    }
    logger.warn({ dxfPath, exitCode: result.exitCode }, result.message);
  }
  logger.info(`Converted ${dxfPath} to ${outputPath}.`);

  const matched = await styleStrokes(outputPath, strokeStyle.color, strokeStyle.width);
  logger.info({ paths: matched }, `Set stroke styles on ${outputPath}.`);
  return outputPath;
}

/**
 * Preprocesses a single DXF file, or every DXF file directly inside a directory.
 * Directory entries that are not DXF files are skipped; any other failure stops the run.
 */
export async function processInput(inputPath: string, outputPath: string | undefined, context: PreprocessContext): Promise<string[]> {
  if (fileExtension(inputPath)) {
    return [await preprocess(inputPath, outputPath, context)];
  }

  const entries = (await fs.readdir(inputPath)).sort();
  const written: string[] = [];
  for (const entry of entries) {
    try {
      written.push(await preprocess(path.join(inputPath, entry), outputPath, context));
    } catch (error: unknown) {
      if (!(error instanceof FileTypeError)) throw error;
      context.logger.info(`Skipped ${entry}`);
    }
  }
  return written;
}

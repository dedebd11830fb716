export * from './types';
export * from './errors';
export { fileExtension, deriveSvgName } from './pathUtils';
export { InkscapeConverter, buildInkscapeArgs, type InkscapeConverterOptions } from './converter';
export {
  styleStrokes,
  restyleSvg,
  laserStrokeStyle,
  BLACK_STROKE_SIGNATURE,
  DEFAULT_STROKE_STYLE,
  SVG_NAMESPACE,
} from './svgStyler';
export { preprocess, processInput, resolveSvgPath, type PreprocessContext } from './preprocess';
export { loadSettings, SettingsSchema, type Settings, type SettingsSources } from './settings';
export { createLogger } from './logger';
export { createProgram } from './main';

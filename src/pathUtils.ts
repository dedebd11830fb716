import * as path from 'path';

/**
 * Extension of the file's base name, including the leading '.'.
 * Empty string when there is none (a dotfile's leading dot does not count).
 */
export const fileExtension = (filePath: string): string => path.extname(path.basename(filePath));

/** Base name of `dxfPath` with whatever extension it had swapped for '.svg'. */
export const deriveSvgName = (dxfPath: string): string => {
  const baseName = path.basename(dxfPath);
  return path.basename(baseName, path.extname(baseName)) + '.svg';
};

import * as fs from 'fs/promises';
import { XMLBuilder, XMLParser, XMLValidator } from 'fast-xml-parser';
import type { StrokeStyle } from './types';
import { SvgParseError, errorMessage } from './errors';

export const SVG_NAMESPACE = 'http://www.w3.org/2000/svg';
export const BLACK_STROKE_SIGNATURE = 'stroke:#000000;fill:none';
export const DEFAULT_STROKE_STYLE: StrokeStyle = { color: '#ff0000', width: 0.07559055 };

const ATTR_PREFIX = '@_';
const ATTRS_KEY = ':@';

// Keys the parser uses for everything that is not an element.
const NON_ELEMENT_KEYS = new Set([ATTRS_KEY, '#text', '#comment', '#cdata']);

const sharedOptions = {
  preserveOrder: true,
  ignoreAttributes: false,
  attributeNamePrefix: ATTR_PREFIX,
  commentPropName: '#comment',
  cdataPropName: '#cdata',
  // Entity and character references pass through as written.
  processEntities: false,
};

const parser = new XMLParser({
  ...sharedOptions,
  trimValues: false,
  parseTagValue: false,
  parseAttributeValue: false,
});
const builder = new XMLBuilder({
  ...sharedOptions,
  suppressEmptyNode: true,
  suppressBooleanAttributes: false,
});

type NamespaceScope = ReadonlyMap<string, string>;

export const laserStrokeStyle = ({ color, width }: StrokeStyle): string =>
  `fill:none;stroke:${color};stroke-opacity:1;stroke-width:${width};stroke-miterlimit:4;stroke-dasharray:none`;

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === 'object' && value !== null && !Array.isArray(value);

function elementName(node: Record<string, unknown>): string | undefined {
  return Object.keys(node).find((key) => !NON_ELEMENT_KEYS.has(key) && !key.startsWith('?'));
}

// xmlns / xmlns:prefix declarations on an element extend the scope inherited from its parent.
function extendScope(scope: NamespaceScope, attrs: Record<string, unknown>): NamespaceScope {
  let next: Map<string, string> | undefined;
  for (const [key, value] of Object.entries(attrs)) {
    if (typeof value !== 'string') continue;
    const name = key.slice(ATTR_PREFIX.length);
    if (name !== 'xmlns' && !name.startsWith('xmlns:')) continue;
    next ??= new Map(scope);
    next.set(name === 'xmlns' ? '' : name.slice('xmlns:'.length), value);
  }
  return next ?? scope;
}

function isSvgPath(tagName: string, scope: NamespaceScope): boolean {
  const colon = tagName.indexOf(':');
  const prefix = colon === -1 ? '' : tagName.slice(0, colon);
  const localName = colon === -1 ? tagName : tagName.slice(colon + 1);
  return localName === 'path' && scope.get(prefix) === SVG_NAMESPACE;
}

function restyleNodes(nodes: unknown, scope: NamespaceScope, newStyle: string): number {
  if (!Array.isArray(nodes)) return 0;
  let matched = 0;

  for (const node of nodes) {
    if (!isRecord(node)) continue;
    const tagName = elementName(node);
    if (!tagName) continue;

    const attrs = node[ATTRS_KEY];
    const elementScope = isRecord(attrs) ? extendScope(scope, attrs) : scope;

    if (isRecord(attrs) && isSvgPath(tagName, elementScope)
      && attrs[`${ATTR_PREFIX}style`] === BLACK_STROKE_SIGNATURE) {
      attrs[`${ATTR_PREFIX}style`] = newStyle;
      matched++;
    }

    matched += restyleNodes(node[tagName], elementScope, newStyle);
  }
  return matched;
}

/**
 * Rewrites every SVG `path` whose style is exactly the black outline signature
 * to the laser-cut style. Anything else in the document is left as parsed.
 */
export function restyleSvg(xml: string, style: StrokeStyle = DEFAULT_STROKE_STYLE): { xml: string; matched: number } {
  const document: unknown = parser.parse(xml);
  const matched = restyleNodes(document, new Map([['xml', 'http://www.w3.org/XML/1998/namespace']]), laserStrokeStyle(style));
  const built = String(builder.build(document));
  const output = xml.endsWith('\n') && !built.endsWith('\n') ? `${built}\n` : built;
  return { xml: output, matched };
}

async function readSvg(svgPath: string): Promise<string> {
  let content: string;
  try {
    content = await fs.readFile(svgPath, 'utf-8');
  } catch (error: unknown) {
    throw new SvgParseError(svgPath, errorMessage(error), { cause: error });
  }

  if (content.trim() === '') {
    throw new SvgParseError(svgPath, 'file is empty');
  }
  const validation = XMLValidator.validate(content);
  if (validation !== true) {
    const { msg, line, col } = validation.err;
    throw new SvgParseError(svgPath, `${msg} (line ${line}, column ${col})`);
  }
  return content;
}

/**
 * Turns the black outlines of an SVG file into laser-cut paths and overwrites the file.
 *
 * @param strokeWidth - in pixels at 96 per inch; the default is 0.02 mm
 * @returns how many paths were restyled
 */
export async function styleStrokes(
  svgPath: string,
  strokeColor: string = DEFAULT_STROKE_STYLE.color,
  strokeWidth: number = DEFAULT_STROKE_STYLE.width,
): Promise<number> {
  const content = await readSvg(svgPath);
  const { xml, matched } = restyleSvg(content, { color: strokeColor, width: strokeWidth });
  await fs.writeFile(svgPath, xml, 'utf-8');
  return matched;
}

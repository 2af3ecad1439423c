/**
 * PDF fonts
 *
 * Text faces come from installed @fontsource packages. Each package ships one
 * WOFF file per Unicode subset, so a face is a chain of files, and every
 * character is drawn with the first file in the chain that has a glyph for it.
 */

import * as fs from 'fs';
import * as path from 'path';
import { createRequire } from 'module';
import * as fontkit from 'fontkit';
import { ConfigurationError } from '../../core/errors.js';

export interface FontFace {
  /** Name the face is registered under in a PDF document */
  name: string;
  data: Buffer;
  covers(codePoint: number): boolean;
}

export interface FontStack {
  regular: FontFace[];
  bold: FontFace[];
  mono: FontFace[];
}

export interface TextRun {
  face: FontFace;
  text: string;
}

const SANS = '@fontsource/noto-sans';
const CJK = '@fontsource/noto-sans-jp';
const MONO = '@fontsource/roboto-mono';

const require = createRequire(import.meta.url);

function packageDir(pkg: string): string {
  for (const dir of require.resolve.paths(pkg) ?? []) {
    const candidate = path.join(dir, pkg);
    if (fs.existsSync(path.join(candidate, 'package.json'))) {
      return candidate;
    }
  }
  throw new ConfigurationError(`Font package not installed: ${pkg}`);
}

function loadFace(file: string): FontFace {
  const data = fs.readFileSync(file);
  const parsed = fontkit.create(data);
  const font = 'fonts' in parsed ? parsed.fonts[0] : parsed;
  return {
    name: path.basename(file, '.woff'),
    data,
    covers: codePoint => font.hasGlyphForCodePoint(codePoint)
  };
}

/**
 * Every subset file of one weight, Latin subsets first
 */
function loadFaces(pkg: string, weight: number): FontFace[] {
  const dir = path.join(packageDir(pkg), 'files');
  const suffix = `-${weight}-normal.woff`;
  const files = fs.readdirSync(dir)
    .filter(file => file.endsWith(suffix))
    .sort((a, b) => Number(!a.includes('-latin-')) - Number(!b.includes('-latin-')) || a.localeCompare(b));

  if (files.length === 0) {
    throw new ConfigurationError(`No ${weight} weight fonts in ${pkg}`);
  }
  return files.map(file => loadFace(path.join(dir, file)));
}

let cachedStack: FontStack | null = null;

/**
 * Loads the font files once per process
 */
export function loadFontStack(): FontStack {
  if (cachedStack === null) {
    const cjkRegular = loadFaces(CJK, 400);
    cachedStack = {
      regular: [...loadFaces(SANS, 400), ...cjkRegular],
      bold: [...loadFaces(SANS, 700), ...loadFaces(CJK, 700)],
      mono: [...loadFaces(MONO, 400), ...cjkRegular]
    };
  }
  return cachedStack;
}

/**
 * Splits text into runs of consecutive characters drawn with the same face.
 * Whitespace stays with the run it follows; characters no face covers fall
 * back to the first face.
 */
export function splitRuns(text: string, faces: FontFace[]): TextRun[] {
  const runs: TextRun[] = [];
  const primary = faces[0];
  if (primary === undefined) {
    throw new ConfigurationError('Font chain is empty');
  }

  for (const char of text) {
    const current = runs[runs.length - 1];
    const codePoint = char.codePointAt(0) ?? 0;
    const face = /\s/.test(char) && current !== undefined
      ? current.face
      : faces.find(candidate => candidate.covers(codePoint)) ?? primary;

    if (current !== undefined && current.face === face) {
      current.text += char;
    } else {
      runs.push({ face, text: char });
    }
  }
  return runs;
}

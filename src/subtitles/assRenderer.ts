import fs from 'fs';
import path from 'path';
import { CaptionEntry } from './types';
import { splitByScript } from './bilingual';
import { millisToPresentationTimestamp } from './timing';

export const SOURCE_STYLE = 'Default';
export const TARGET_STYLE = 'Chinese';

const SOURCE_LAYER = 0;
const TARGET_LAYER = 1;

/**
 * Typography for the two subtitle styles
 */
export interface AssStyleOptions {
  title?: string;
  playResX?: number;
  playResY?: number;
  sourceFontName?: string;
  sourceFontSize?: number;
  targetFontName?: string;
  targetFontSize?: number;
  /** Distance of the source group from the bottom edge */
  marginV?: number;
}

type ResolvedStyleOptions = Required<AssStyleOptions>;

const DEFAULT_STYLE_OPTIONS: ResolvedStyleOptions = {
  title: 'Bilingual Subtitles',
  playResX: 1280,
  playResY: 720,
  sourceFontName: 'Arial',
  sourceFontSize: 16,
  targetFontName: 'VYuan_Round',
  targetFontSize: 20,
  marginV: 10,
};

function resolveStyleOptions(options: AssStyleOptions): ResolvedStyleOptions {
  return {
    title: options.title ?? DEFAULT_STYLE_OPTIONS.title,
    playResX: options.playResX ?? DEFAULT_STYLE_OPTIONS.playResX,
    playResY: options.playResY ?? DEFAULT_STYLE_OPTIONS.playResY,
    sourceFontName: options.sourceFontName ?? DEFAULT_STYLE_OPTIONS.sourceFontName,
    sourceFontSize: options.sourceFontSize ?? DEFAULT_STYLE_OPTIONS.sourceFontSize,
    targetFontName: options.targetFontName ?? DEFAULT_STYLE_OPTIONS.targetFontName,
    targetFontSize: options.targetFontSize ?? DEFAULT_STYLE_OPTIONS.targetFontSize,
    marginV: options.marginV ?? DEFAULT_STYLE_OPTIONS.marginV,
  };
}

const STYLE_FORMAT =
  'Format: Name, Fontname, Fontsize, PrimaryColour, SecondaryColour, OutlineColour, BackColour, ' +
  'Bold, Italic, Underline, StrikeOut, ScaleX, ScaleY, Spacing, Angle, BorderStyle, Outline, ' +
  'Shadow, Alignment, MarginL, MarginR, MarginV, Encoding';

const EVENT_FORMAT = 'Format: Layer, Start, End, Style, Name, MarginL, MarginR, MarginV, Effect, Text';

interface StyleSpec {
  name: string;
  fontName: string;
  fontSize: number;
  outlineColour: string;
  outline: number;
  marginV: number;
}

function buildStyle(spec: StyleSpec): string {
  return (
    `Style: ${spec.name},${spec.fontName},${spec.fontSize},` +
    `&H00FFFFFF,&H000000FF,${spec.outlineColour},&H00000000,` +
    `0,0,0,0,100,100,0,0,1,${spec.outline},0,2,10,10,${spec.marginV},1`
  );
}

/**
 * Vertical margin that lifts the target group above a two-line source group
 */
export function targetMarginV(options: AssStyleOptions = {}): number {
  const resolved = resolveStyleOptions(options);
  const sourceBlockHeight = resolved.sourceFontSize * 2 * 1.25;
  return Math.round(resolved.marginV + sourceBlockHeight + 5);
}

/**
 * Builds the [Script Info] and [V4+ Styles] sections plus the [Events] format line
 */
export function buildAssHeader(options: AssStyleOptions = {}): string {
  const resolved = resolveStyleOptions(options);

  const sourceStyle = buildStyle({
    name: SOURCE_STYLE,
    fontName: resolved.sourceFontName,
    fontSize: resolved.sourceFontSize,
    outlineColour: '&H00000000',
    outline: 2,
    marginV: resolved.marginV,
  });
  const targetStyle = buildStyle({
    name: TARGET_STYLE,
    fontName: resolved.targetFontName,
    fontSize: resolved.targetFontSize,
    outlineColour: '&H000000FF',
    outline: 3,
    marginV: targetMarginV(resolved),
  });

  return [
    '[Script Info]',
    `Title: ${resolved.title}`,
    'ScriptType: v4.00+',
    'WrapStyle: 0',
    `PlayResX: ${resolved.playResX}`,
    `PlayResY: ${resolved.playResY}`,
    'ScaledBorderAndShadow: yes',
    '',
    '[V4+ Styles]',
    STYLE_FORMAT,
    sourceStyle,
    targetStyle,
    '',
    '[Events]',
    EVENT_FORMAT,
  ].join('\n');
}

function dialogue(layer: number, start: string, end: string, style: string, lines: string[]): string {
  return `Dialogue: ${layer},${start},${end},${style},,0,0,0,,${lines.join('\\N')}`;
}

/**
 * Converts the dialogue events for one caption.
 * Target-language lines and source-language lines become separate events over the same interval;
 * a group with no lines produces no event.
 */
export function captionToDialogues(entry: CaptionEntry): string[] {
  const start = millisToPresentationTimestamp(entry.startMs);
  const end = millisToPresentationTimestamp(entry.endMs);
  const groups = splitByScript(entry.text);
  const events: string[] = [];

  if (groups.target.length > 0) {
    events.push(dialogue(TARGET_LAYER, start, end, TARGET_STYLE, groups.target));
  }
  if (groups.source.length > 0) {
    events.push(dialogue(SOURCE_LAYER, start, end, SOURCE_STYLE, groups.source));
  }

  return events;
}

/**
 * Renders a bilingual caption stream as an ASS script
 */
export function renderAssScript(entries: readonly CaptionEntry[], options: AssStyleOptions = {}): string {
  const events = entries.flatMap(captionToDialogues);
  return `${buildAssHeader(options)}\n${events.map((event) => `${event}\n`).join('')}`;
}

/**
 * Writes an ASS script as UTF-8 with a byte order mark
 */
export async function writeAssFile(filePath: string, content: string): Promise<void> {
  await fs.promises.mkdir(path.dirname(filePath), { recursive: true });
  await fs.promises.writeFile(filePath, `\uFEFF${content}`, 'utf-8');
}

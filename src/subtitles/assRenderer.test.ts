import fs from 'fs';
import os from 'os';
import path from 'path';
import { describe, it, expect } from 'vitest';
import { buildAssHeader, captionToDialogues, renderAssScript, targetMarginV, writeAssFile } from './assRenderer';

describe('targetMarginV', () => {
  it('should stack the target group above two source lines', () => {
    expect(targetMarginV()).toBe(55);
    expect(targetMarginV({ sourceFontSize: 13 })).toBe(48);
    expect(targetMarginV({ sourceFontSize: 13, marginV: 0 })).toBe(38);
  });
});

describe('buildAssHeader', () => {
  it('should declare both styles with the configured fonts', () => {
    const lines = buildAssHeader({ sourceFontSize: 13, targetFontSize: 17 }).split('\n');

    expect(lines[0]).toBe('[Script Info]');
    expect(lines).toContain('PlayResX: 1280');
    expect(lines).toContain('PlayResY: 720');
    expect(lines).toContain(
      'Style: Default,Arial,13,&H00FFFFFF,&H000000FF,&H00000000,&H00000000,0,0,0,0,100,100,0,0,1,2,0,2,10,10,10,1'
    );
    expect(lines).toContain(
      'Style: Chinese,VYuan_Round,17,&H00FFFFFF,&H000000FF,&H000000FF,&H00000000,0,0,0,0,100,100,0,0,1,3,0,2,10,10,48,1'
    );
    expect(lines[lines.length - 1]).toBe(
      'Format: Layer, Start, End, Style, Name, MarginL, MarginR, MarginV, Effect, Text'
    );
  });
});

describe('captionToDialogues', () => {
  it('should emit the target group on layer 1 and the source group on layer 0', () => {
    const events = captionToDialogues({
      index: 1,
      startMs: 1234,
      endMs: 62005,
      text: 'Hello there\n你好\nGeneral\n将军',
    });

    expect(events).toEqual([
      'Dialogue: 1,0:00:01.23,0:01:02.00,Chinese,,0,0,0,,你好\\N将军',
      'Dialogue: 0,0:00:01.23,0:01:02.00,Default,,0,0,0,,Hello there\\NGeneral',
    ]);
  });

  it('should skip a language group with no lines', () => {
    expect(captionToDialogues({ index: 1, startMs: 0, endMs: 1000, text: 'Only English' })).toEqual([
      'Dialogue: 0,0:00:00.00,0:00:01.00,Default,,0,0,0,,Only English',
    ]);
    expect(captionToDialogues({ index: 2, startMs: 0, endMs: 1000, text: '\n  \n' })).toEqual([]);
  });
});

describe('renderAssScript', () => {
  it('should append one line per event after the header', () => {
    const script = renderAssScript([{ index: 1, startMs: 0, endMs: 500, text: 'Hi\n嗨' }]);

    expect(script).toBe(
      `${buildAssHeader()}\n` +
        'Dialogue: 1,0:00:00.00,0:00:00.50,Chinese,,0,0,0,,嗨\n' +
        'Dialogue: 0,0:00:00.00,0:00:00.50,Default,,0,0,0,,Hi\n'
    );
  });
});

describe('writeAssFile', () => {
  it('should write UTF-8 with a byte order mark', async () => {
    const tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), 'ass-renderer-'));
    const filePath = path.join(tmpDir, 'out.ass');

    try {
      await writeAssFile(filePath, '[Script Info]\n');
      const bytes = fs.readFileSync(filePath);

      expect([...bytes.subarray(0, 3)]).toEqual([0xef, 0xbb, 0xbf]);
      expect(bytes.subarray(3).toString('utf-8')).toBe('[Script Info]\n');
    } finally {
      fs.rmSync(tmpDir, { recursive: true, force: true });
    }
  });
});

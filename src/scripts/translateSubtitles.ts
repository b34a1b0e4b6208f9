/**
 * Translates an SRT file into bilingual SRT/ASS outputs, or merges two existing files.
 * Run with: npm run translate -- <file.srt>   |   npm run merge -- <source.srt> <translated.srt>
 */

import { createTranslationProvider } from '../llm';
import { loadSystemPrompt } from '../translation';
import { mergeSubtitleFiles, translateSubtitleFile, PipelineResult } from '../pipelines';
import { config } from '../config';
import { parseCliArgs, USAGE } from './cliArgs';

function printSummary(result: PipelineResult): void {
  console.info(`\nDone: ${result.captions} captions`);
  for (const [name, filePath] of Object.entries(result.outputs)) {
    if (filePath) console.info(`   ${name}: ${filePath}`);
  }
  if (result.adjustedOverlaps > 0) {
    console.info(`   Overlaps repaired: ${result.adjustedOverlaps}`);
  }
  if (result.skipped.length > 0) {
    console.warn(`   Malformed blocks skipped: ${result.skipped.length}`);
  }
  if (result.filled.length > 0) {
    console.warn(`   Captions left untranslated: ${result.filled.length}`);
  }
  console.info('');
}

async function main(): Promise<void> {
  const command = parseCliArgs(process.argv.slice(2));

  if (command.kind === 'help') {
    console.info(USAGE);
    return;
  }

  const style = {
    sourceFontSize: config.assSourceFontSize,
    targetFontSize: config.assTargetFontSize,
  };

  if (command.kind === 'merge') {
    const result = await mergeSubtitleFiles(command.sourcePath, command.translatedPath, {
      outputDir: command.outputDir,
      style,
    });
    printSummary(result);
    return;
  }

  const provider = createTranslationProvider(command.provider ?? config.translationProvider);
  const systemPrompt = await loadSystemPrompt(config.promptsDir);

  // Ctrl+C stops before the next batch instead of killing a request mid-flight
  const controller = new AbortController();
  process.once('SIGINT', () => {
    console.warn('\nCancelling after the current batch...');
    controller.abort();
  });

  const result = await translateSubtitleFile(command.inputPath, {
    provider,
    systemPrompt,
    outputDir: command.outputDir,
    fps: command.fps ?? config.subtitleFps,
    mergeLines: command.mergeLines,
    cjkThreshold: config.mergeCjkThreshold,
    batchSize: command.batchSize ?? config.translationBatchSize,
    maxAttempts: config.translationMaxAttempts,
    style,
    signal: controller.signal,
    onStage: (_stage, detail) => console.info(detail),
    onBatch: (progress) =>
      console.info(`   ${progress.resolved}/${progress.total} captions (batch ${progress.batchNumber}/${progress.totalBatches})`),
  });

  printSummary(result);
}

main().catch((error) => {
  console.error('Error:', error instanceof Error ? error.message : error);
  console.error(`\n${USAGE}`);
  process.exit(1);
});

export * from './subtitlePipeline';
export * from './subtitleJobRunner';

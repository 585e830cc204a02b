export * from './config.js';
export * from './errors.js';
export * from './timeCodec.js';
export * from './keywordExtractor.js';
export * from './durationSplitter.js';
export * from './mediaReference.js';
export * from './clipMaterializer.js';
export * from './overlapResolver.js';
export * from './frameQuantizer.js';
export * from './fcpxmlSerializer.js';
export * from './timelineBuilder.js';
export * from './timelineStats.js';

export * from './translationPipeline';

export * from './section';
export * from './comment-tags';

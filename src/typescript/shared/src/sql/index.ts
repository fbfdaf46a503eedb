export * from './tokenizer';
export * from './parser';
export * from './rewriter';
export * from './placeholders';
export * from './executor';
export * from './gateway';

export type * from './query.types.js';
export type * from './chat.types.js';

export * from './cover-search.js';
export * from './embed.js';
export * from './ffmpeg.js';
export * from './image.js';

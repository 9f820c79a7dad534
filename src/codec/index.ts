export * from './errors';
export * from './bitPacker';
export * from './fieldLayout';
export * from './quantization';
export * from './airTrack';
export * from './envelope';

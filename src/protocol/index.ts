/**
 * Protocol layer exports: decoder contract, per-family decoders and the
 * factory that picks one.
 */

export * from './decoder';
export * from './battery';
export * from './ninebot-can';
export * from './factory';

export * from './decoders/auto-detect';
export * from './decoders/gotway';
export * from './decoders/inmotion';
export * from './decoders/inmotion-v2';
export * from './decoders/kingsong';
export * from './decoders/ninebot';
export * from './decoders/ninebot-z';
export * from './decoders/veteran';

export * from './unpackers/gotway-unpacker';
export * from './unpackers/inmotion-unpacker';
export * from './unpackers/inmotion-v2-unpacker';
export * from './unpackers/ninebot-unpacker';
export * from './unpackers/veteran-unpacker';

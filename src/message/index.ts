export { defineMessage } from './MessageType';
export type { MessageDefinition, MessageType } from './MessageType';
export { FrameCodec, defaultFrameHeader } from './FrameCodec';
export type { FrameCodecOptions, FrameHeader, FrameHeaderLayout, SplitFrame } from './FrameCodec';
export { MessageRegistry, route } from './MessageRegistry';
export type { DecodedMessage, MessageRegistryOptions, MessageRoute } from './MessageRegistry';

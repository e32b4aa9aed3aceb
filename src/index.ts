export { ByteBuffer, bytesToHex, hexToBytes } from './ByteBuffer';
export {
  CodecError,
  MissingFieldError,
  InsufficientDataError,
  LengthMismatchError,
  ChecksumMismatchError,
  PaddingMismatchError,
  DuplicateFieldError,
  SchemaOrderError,
  UnknownVariantError,
  DuplicateVariantError,
  ValueTypeError,
  InvalidSchemaError,
  isCodecError,
} from './errors';
export type { CodecErrorKind } from './errors';
export { attempt } from './result';
export type { Result } from './result';
export { silentLogger, consoleLogger, labelledLogger } from './logger';
export type { Logger } from './logger';
export {
  isValueMap,
  getField,
  getNumber,
  getBigInt,
  getBytes,
  getText,
  getMap,
  getArray,
} from './values';
export type { Scalar, Value, ValueMap } from './values';
export { CONSUME_ALL } from './schema/types';
export type {
  Node,
  NodeKind,
  ByteOrder,
  IntegerWidth,
  FloatWidth,
  IntegerNode,
  FloatNode,
  NumericNode,
  SequenceNode,
  ArraySequence,
  BytesSequence,
  LengthPolicy,
  CountFunction,
  LengthBinding,
  StructNode,
  ChecksumNode,
  ChecksumPlacement,
  PaddingNode,
} from './schema/types';
export {
  integer,
  float,
  int8,
  int16,
  int32,
  int64,
  uint8,
  uint16,
  uint32,
  uint64,
  float32,
  float64,
} from './schema/numeric';
export type { NumericOptions, IntegerOptions, FloatOptions } from './schema/numeric';
export { array, bytes, text, fixed, dynamic, consumer } from './schema/sequence';
export type { LengthSpec, ArrayOptions, BytesOptions } from './schema/sequence';
export { struct, layout } from './schema/struct';
export { checksum } from './schema/checksum';
export type { ChecksumOptions } from './schema/checksum';
export { padding } from './schema/padding';
export { exposedNames, minimumSize } from './schema/analysis';
export { xor, crc32, defaultAlgorithms, sameChecksum } from './checksum/algorithms';
export type { ChecksumAlgorithm } from './checksum/algorithms';
export { encodeField, encodeValue, decodeField, decodeValue } from './codecs/dispatch';
export { measureValue, measureEncoded } from './codecs/measure';
export { LayoutCodec } from './schema/LayoutCodec';
export type { LayoutCodecOptions, PrefixDecodeResult } from './schema/LayoutCodec';
export { LayoutBuilder } from './schema/LayoutBuilder';
export type { BuildOptions } from './schema/LayoutBuilder';
export { parseFieldDefinition } from './schema/LayoutDefinition';
export type { FieldDefinition, LengthDefinition } from './schema/LayoutDefinition';
export { parseLayoutModule, convertModuleToDefinitions, compileLayouts } from './parser';
export type {
  LayoutModule,
  LayoutStruct,
  LayoutField,
  LayoutDataField,
  LayoutChecksumField,
  LayoutPaddingField,
  LayoutType,
  LayoutDimension,
} from './parser';
export { defineMessage, FrameCodec, defaultFrameHeader, MessageRegistry, route } from './message';
export type {
  MessageDefinition,
  MessageType,
  FrameCodecOptions,
  FrameHeader,
  FrameHeaderLayout,
  SplitFrame,
  DecodedMessage,
  MessageRegistryOptions,
  MessageRoute,
} from './message';

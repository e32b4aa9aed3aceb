/**
 * AST types for parsed layout modules.
 */

import type { ByteOrder, ChecksumPlacement, FloatWidth, IntegerWidth } from '../schema/types';

/** A complete layout source file. */
export interface LayoutModule {
  structs: LayoutStruct[];
}

/** A top-level declaration: `struct Name { ... }` */
export interface LayoutStruct {
  name: string;
  fields: LayoutField[];
  /** 1-based source line of the declaration. */
  line: number;
}

export type LayoutField = LayoutDataField | LayoutChecksumField | LayoutPaddingField;

/** `[reversed] type name [dimension];` */
export interface LayoutDataField {
  kind: 'Field';
  name: string;
  reversed: boolean;
  type: LayoutType;
  dimension?: LayoutDimension;
}

/** `checksum algorithm name [prefix|suffix] { field }` */
export interface LayoutChecksumField {
  kind: 'Checksum';
  name: string;
  algorithm: string;
  placement?: ChecksumPlacement;
  field: LayoutField;
}

/** `pad N;` */
export interface LayoutPaddingField {
  kind: 'Padding';
  size: number;
}

export type LayoutType =
  | { kind: 'Integer'; signed: boolean; width: IntegerWidth; byteOrder?: ByteOrder }
  | { kind: 'Float'; width: FloatWidth; byteOrder?: ByteOrder }
  | { kind: 'Bytes'; text: boolean }
  | { kind: 'Struct'; fields: LayoutField[] }
  | { kind: 'Reference'; name: string };

export type LayoutDimension =
  | { kind: 'Fixed'; count: number }
  | { kind: 'Field'; name: string }
  | { kind: 'Rest' };

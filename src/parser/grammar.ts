/**
 * PEG grammar for the layout description language.
 * Compiled by peggy at runtime.
 */
export const LAYOUT_GRAMMAR = `
Module
  = _ structs:StructDeclaration* _
    {
      return { structs: structs };
    }

StructDeclaration
  = "struct" !IdentChar _ name:Identifier _ "{" fields:FieldList _ "}" _ (";" _)?
    {
      return { name: name, fields: fields, line: location().start.line };
    }

FieldList
  = fields:(_ f:Field { return f; })* { return fields; }

Field
  = ChecksumField
  / PaddingField
  / InlineStructField
  / PlainField

ChecksumField
  = "checksum" !IdentChar _ algorithm:Identifier _ name:Identifier
    placement:(_ p:Placement { return p; })? _ "{" _ field:Field _ "}" (_ ";")?
    {
      return {
        kind: "Checksum",
        name: name,
        algorithm: algorithm,
        placement: placement || undefined,
        field: field
      };
    }

Placement
  = "prefix" !IdentChar { return "prefix"; }
  / "suffix" !IdentChar { return "suffix"; }

PaddingField
  = "pad" !IdentChar _ size:Integer _ ";"
    {
      return { kind: "Padding", size: size };
    }

InlineStructField
  = reversed:Reversed? "struct" _ "{" fields:FieldList _ "}" _ name:Identifier _ dim:Dimension? _ ";"
    {
      return {
        kind: "Field",
        name: name,
        reversed: reversed !== null,
        type: { kind: "Struct", fields: fields },
        dimension: dim || undefined
      };
    }

PlainField
  = reversed:Reversed? type:TypeName _ name:Identifier _ dim:Dimension? _ ";"
    {
      return {
        kind: "Field",
        name: name,
        reversed: reversed !== null,
        type: type,
        dimension: dim || undefined
      };
    }

Reversed
  = "reversed" !IdentChar _ { return true; }

// Types
TypeName
  = IntegerType
  / FloatType
  / BytesType
  / ReferenceType

IntegerType
  = unsigned:"u"? "int" bits:("8" / "16" / "32" / "64") order:ByteOrderSuffix? !IdentChar
    {
      return {
        kind: "Integer",
        signed: unsigned === null,
        width: parseInt(bits, 10) / 8,
        byteOrder: order || undefined
      };
    }

FloatType
  = name:("float32" / "float64" / "single" / "double") order:ByteOrderSuffix? !IdentChar
    {
      var width = (name === "float32" || name === "single") ? 4 : 8;
      return { kind: "Float", width: width, byteOrder: order || undefined };
    }

ByteOrderSuffix
  = "le" { return "little"; }
  / "be" { return "big"; }
  / "ne" { return "native"; }

BytesType
  = "bytes" !IdentChar { return { kind: "Bytes", text: false }; }
  / "string" !IdentChar { return { kind: "Bytes", text: true }; }

ReferenceType
  = name:Identifier { return { kind: "Reference", name: name }; }

Dimension
  = "[" _ "]" { return { kind: "Rest" }; }
  / "[" _ count:Integer _ "]" { return { kind: "Fixed", count: count }; }
  / "[" _ field:Identifier _ "]" { return { kind: "Field", name: field }; }

// Lexical
Integer
  = "0x"i digits:$[0-9a-fA-F]+ { return parseInt(digits, 16); }
  / digits:$[0-9]+ { return parseInt(digits, 10); }

Identifier
  = $([A-Za-z_] IdentChar*)

IdentChar
  = [A-Za-z0-9_]

// Whitespace and comments
_
  = (WhiteSpace / Comment)*

WhiteSpace
  = [ \\t\\n\\r]+

Comment
  = "//" [^\\n]* ("\\n" / !.)
  / "/*" (!"*/" .)* "*/"
`;

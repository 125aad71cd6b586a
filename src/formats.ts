import type { FormatClass } from "./metadata";

export const PlainTextFormat: FormatClass = {
  id: "PlainTextFormat",
  label: "Plain text",
  mimetype: "text/plain",
  attributes: {
    encoding: { kind: "required" },
    language: { kind: "optional" },
  },
  allowCustomAttributes: false,
};

export const TokenizedTextFormat: FormatClass = {
  id: "TokenizedTextFormat",
  label: "Plain text, tokenized",
  mimetype: "text/plain",
  attributes: {
    encoding: { kind: "required" },
    language: { kind: "optional" },
    tokenized: { kind: "fixed", value: true },
  },
  allowCustomAttributes: false,
};

export const CSVFormat: FormatClass = {
  id: "CSVFormat",
  label: "Comma separated values",
  mimetype: "text/csv",
  attributes: {
    encoding: { kind: "required" },
    delimiter: { kind: "optional" },
  },
  allowCustomAttributes: false,
};

export const JSONFormat: FormatClass = {
  id: "JSONFormat",
  label: "JSON",
  mimetype: "application/json",
  attributes: {},
  allowCustomAttributes: true,
};

export const XMLFormat: FormatClass = {
  id: "XMLFormat",
  label: "XML",
  mimetype: "text/xml",
  attributes: {},
  allowCustomAttributes: true,
};

// Free-form metadata: any key, any scalar value
export const MetadataFormat: FormatClass = {
  id: "MetadataFormat",
  label: "Unspecified",
  attributes: null,
  allowCustomAttributes: true,
};

export const BUILTIN_FORMATS: Readonly<Record<string, FormatClass>> = {
  PlainTextFormat,
  TokenizedTextFormat,
  CSVFormat,
  JSONFormat,
  XMLFormat,
  MetadataFormat,
};

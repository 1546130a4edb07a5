export interface Attribute {
  name: string;
  value: string | null;
}

export interface StartTagEvent {
  type: "StartTag";
  tag: string;
  attributes: Attribute[];
  raw: string;
}

export interface SelfClosingTagEvent {
  type: "SelfClosingTag";
  tag: string;
  attributes: Attribute[];
  raw: string;
}

export interface EndTagEvent {
  type: "EndTag";
  tag: string;
}

export interface TextEvent {
  type: "Text";
  data: string;
}

export type MarkupEvent =
  | StartTagEvent
  | SelfClosingTagEvent
  | EndTagEvent
  | TextEvent;

export type Chunk = string | Uint8Array;

export type FragmentSource =
  | Chunk
  | Iterable<Chunk>
  | AsyncIterable<Chunk>;

export type FragmentSink = (fragment: string) => void;

export type FieldRecord = Record<string, string | null>;

/**
 * Output Types
 *
 * Items of an assembled reply, and the host message chain they are spliced
 * into.
 */

export interface TextOutput {
  type: 'text';
  text: string;
}

export interface ImageOutput {
  type: 'image';
  /** PNG path in the cache directory */
  path: string;
}

export type OutputItem = TextOutput | ImageOutput;

/** Plain text sent by the host */
export interface PlainChainItem {
  kind: 'plain';
  text: string;
}

/** Image reference sent by the host */
export interface ImageChainItem {
  kind: 'image';
  path: string;
}

/** Any other host item (mentions, replies, files); never inspected */
export interface PassthroughChainItem<TPayload = unknown> {
  kind: 'passthrough';
  payload: TPayload;
}

export type MessageChainItem<TPayload = unknown> =
  | PlainChainItem
  | ImageChainItem
  | PassthroughChainItem<TPayload>;

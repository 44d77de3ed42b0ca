/**
 * Message Chain Expansion
 *
 * Splices rendered output into a host message chain: every plain item is
 * replaced by the items its text renders to, everything else is kept as is.
 */

import type { MessageChainItem, OutputItem } from './output.types.js';

export type RenderText = (text: string) => Promise<OutputItem[]>;

function toChainItem<TPayload>(item: OutputItem): MessageChainItem<TPayload> {
  switch (item.type) {
    case 'text':
      return { kind: 'plain', text: item.text };
    case 'image':
      return { kind: 'image', path: item.path };
  }
}

export async function expandMessageChain<TPayload>(
  chain: readonly MessageChainItem<TPayload>[],
  renderText: RenderText
): Promise<MessageChainItem<TPayload>[]> {
  const expanded: MessageChainItem<TPayload>[] = [];

  for (const item of chain) {
    switch (item.kind) {
      case 'plain': {
        const rendered = await renderText(item.text);
        expanded.push(...rendered.map((output) => toChainItem<TPayload>(output)));
        break;
      }
      case 'image':
      case 'passthrough':
        expanded.push(item);
        break;
      default: {
        const unhandled: never = item;
        throw new Error(`Unhandled message chain item: ${JSON.stringify(unhandled)}`);
      }
    }
  }

  return expanded;
}

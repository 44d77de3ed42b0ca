export * from './output.types.js';
export { OutputAssembler, renderFailureText, RENDER_FAILED_MARKER } from './output-assembler.js';
export type { AssemblerOptions } from './output-assembler.js';
export { expandMessageChain } from './message-chain.js';
export type { RenderText } from './message-chain.js';

import { userBlocks, type KernelState, type PassDeps } from "./contracts.js";

/**
 * First walk: one target block per source label, in executable order, so that
 * forward branch targets resolve during lowering. A repeated label reuses the
 * block created for it.
 */
export function createBlocksPass(state: KernelState, deps: PassDeps): void {
  for (const source of userBlocks(state.kernel)) {
    if (state.blocks.has(source.label)) continue;
    deps.log(2, `Creating basic block ${source.label}`);
    state.blocks.set(source.label, state.fn.newBasicBlock(state.fn.blocks.length, source.label));
  }
}

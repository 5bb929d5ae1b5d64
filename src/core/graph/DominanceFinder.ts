/*
 * Copyright (c) 2024 Huawei Device Co., Ltd.
 * Licensed under the Apache License, Version 2.0 (the "License");
 * you may not use this file except in compliance with the License.
 * You may obtain a copy of the License at
 *
 *     http://www.apache.org/licenses/LICENSE-2.0
 *
 * Unless required by applicable law or agreed to in writing, software
 * distributed under the License is distributed on an "AS IS" BASIS,
 * WITHOUT WARRANTIES OR CONDITIONS OF ANY KIND, either express or implied.
 * See the License for the specific language governing permissions and
 * limitations under the License.
 */

import { Stmt } from '../base/Stmt';
import { BasicBlock } from './BasicBlock';
import { Cfg } from './Cfg';

/**
 * Dominance queries needed by the loop and instrumentation passes.
 * @category core/graph
 */
export interface DominanceProvider {
    dominates(a: BasicBlock, b: BasicBlock): boolean;

    /** Statement-level dominance: within one block, `a` dominates `b` if it comes first or is `b`. */
    stmtDominates(a: Stmt, b: Stmt): boolean;
}

/**
 * Immediate dominators computed over a reverse post-order numbering of the reachable blocks.
 * Blocks unreachable from the starting block dominate nothing and are dominated by nothing.
 * @category core/graph
 */
export class DominanceFinder implements DominanceProvider {
    private cfg: Cfg;
    private blocks: BasicBlock[] = [];
    private blockToIdx = new Map<BasicBlock, number>();
    private idoms: number[] = [];

    constructor(cfg: Cfg) {
        this.cfg = cfg;
        const startingBlock = cfg.getStartingBlock();
        if (!startingBlock) {
            return;
        }
        this.blocks = DominanceFinder.reversePostOrder(startingBlock);
        for (let i = 0; i < this.blocks.length; i++) {
            this.blockToIdx.set(this.blocks[i], i);
        }

        // calculate immediate dominator for each block
        this.idoms = new Array<number>(this.blocks.length).fill(-1);
        this.idoms[0] = 0;
        let isChanged = true;
        while (isChanged) {
            isChanged = false;
            for (let blockIdx = 1; blockIdx < this.blocks.length; blockIdx++) {
                let newIdom = -1;
                for (const pred of this.blocks[blockIdx].getPredecessors()) {
                    const predIdx = this.blockToIdx.get(pred);
                    if (predIdx === undefined || this.idoms[predIdx] === -1) {
                        continue;
                    }
                    newIdom = newIdom === -1 ? predIdx : this.intersect(newIdom, predIdx);
                }
                if (newIdom !== -1 && this.idoms[blockIdx] !== newIdom) {
                    this.idoms[blockIdx] = newIdom;
                    isChanged = true;
                }
            }
        }
    }

    public getCfg(): Cfg {
        return this.cfg;
    }

    /** Returns the reachable blocks in reverse post-order. */
    public getBlocks(): BasicBlock[] {
        return this.blocks;
    }

    public getBlockToIdx(): Map<BasicBlock, number> {
        return this.blockToIdx;
    }

    public getImmediateDominators(): number[] {
        return this.idoms;
    }

    /**
     * Returns the immediate dominator of `block`, or **null** for the starting block and
     * unreachable blocks.
     */
    public getImmediateDominator(block: BasicBlock): BasicBlock | null {
        const idx = this.blockToIdx.get(block);
        if (idx === undefined || idx === 0) {
            return null;
        }
        return this.blocks[this.idoms[idx]];
    }

    public isReachable(block: BasicBlock): boolean {
        return this.blockToIdx.has(block);
    }

    public dominates(a: BasicBlock, b: BasicBlock): boolean {
        const aIdx = this.blockToIdx.get(a);
        let bIdx = this.blockToIdx.get(b);
        if (aIdx === undefined || bIdx === undefined) {
            return false;
        }
        // idoms always have a smaller RPO index, so the walk up stops once it passes aIdx
        while (bIdx > aIdx) {
            bIdx = this.idoms[bIdx];
        }
        return bIdx === aIdx;
    }

    public stmtDominates(a: Stmt, b: Stmt): boolean {
        const aBlock = this.cfg.getBlockOf(a);
        const bBlock = this.cfg.getBlockOf(b);
        if (!aBlock || !bBlock) {
            return false;
        }
        if (aBlock !== bBlock) {
            return this.dominates(aBlock, bBlock);
        }
        const stmts = aBlock.getStmts();
        return stmts.indexOf(a) <= stmts.indexOf(b);
    }

    private intersect(a: number, b: number): number {
        while (a !== b) {
            if (a > b) {
                a = this.idoms[a];
            } else {
                b = this.idoms[b];
            }
        }
        return a;
    }

    private static reversePostOrder(start: BasicBlock): BasicBlock[] {
        const postOrder: BasicBlock[] = [];
        const visited = new Set<BasicBlock>([start]);
        const stack: { block: BasicBlock; next: number }[] = [{ block: start, next: 0 }];
        while (stack.length > 0) {
            const top = stack[stack.length - 1];
            const succs = top.block.getSuccessors();
            if (top.next < succs.length) {
                const succ = succs[top.next++];
                if (!visited.has(succ)) {
                    visited.add(succ);
                    stack.push({ block: succ, next: 0 });
                }
                continue;
            }
            postOrder.push(top.block);
            stack.pop();
        }
        return postOrder.reverse();
    }
}

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

import { BasicBlock } from './BasicBlock';
import { Cfg } from './Cfg';
import { DominanceFinder } from './DominanceFinder';
import { Loop } from './Loop';
import Logger, { LOG_MODULE_TYPE } from '../../utils/logger';
const logger = Logger.getLogger(LOG_MODULE_TYPE.MIGRATION_ANALYZER, 'LoopInfo');

/**
 * The loop forest of a CFG. A back-edge is an edge whose target dominates its source; all
 * back-edges into one header form a single natural loop. Loops are stored in an arena and
 * numbered by the reverse post-order position of their headers.
 *
 * @category core/graph
 * @example
 * 1. walk every nest innermost-first.

```typescript
const loopInfo = new LoopInfo(cfg);
for (const top of loopInfo.getTopLevelLoops()) {
    for (const loop of loopInfo.getLoopNest(top)) {
        ...
    }
}
```
 */
export class LoopInfo {
    private loops: Loop[] = [];
    private innermost: Map<BasicBlock, Loop> = new Map();

    constructor(cfg: Cfg, dominance: DominanceFinder = new DominanceFinder(cfg)) {
        const latchesOf = new Map<BasicBlock, BasicBlock[]>();
        for (const block of dominance.getBlocks()) {
            for (const succ of block.getSuccessors()) {
                if (!dominance.dominates(succ, block)) {
                    continue;
                }
                const latches = latchesOf.get(succ) ?? [];
                if (!latches.includes(block)) {
                    latches.push(block);
                }
                latchesOf.set(succ, latches);
            }
        }

        // headers are visited in reverse post-order, so ids follow it as well
        for (const header of dominance.getBlocks()) {
            const latches = latchesOf.get(header);
            if (!latches) {
                continue;
            }
            const members = this.collectMembers(cfg, dominance, header, latches);
            this.loops.push(new Loop(this.loops.length, header, latches, members));
        }

        this.buildNesting();
        logger.debug(`found ${this.loops.length} loops`);
    }

    public getLoops(): Loop[] {
        return this.loops;
    }

    public getLoop(id: number): Loop {
        const loop = this.loops[id];
        if (!loop) {
            throw new Error(`No loop with id ${id}.`);
        }
        return loop;
    }

    /** Returns the innermost loop containing `block`, or **undefined** if it is in no loop. */
    public getLoopFor(block: BasicBlock): Loop | undefined {
        return this.innermost.get(block);
    }

    public getLoopDepth(block: BasicBlock): number {
        return this.innermost.get(block)?.getDepth() ?? 0;
    }

    public isLoopHeader(block: BasicBlock): boolean {
        return this.innermost.get(block)?.getHeader() === block;
    }

    public getTopLevelLoops(): Loop[] {
        return this.loops.filter(loop => loop.getParentId() === null);
    }

    public getParent(loop: Loop): Loop | undefined {
        const parentId = loop.getParentId();
        return parentId === null ? undefined : this.loops[parentId];
    }

    public getChildren(loop: Loop): Loop[] {
        return loop.getChildIds().map(id => this.getLoop(id));
    }

    /**
     * Returns the immediate child of `loop` which contains `block`, or **undefined** if the block
     * belongs to no child.
     */
    public getChildContaining(loop: Loop, block: BasicBlock): Loop | undefined {
        return this.getChildren(loop).find(child => child.contains(block));
    }

    /**
     * Returns `loop` and all loops nested in it, children before their parents.
     */
    public getLoopNest(loop: Loop): Loop[] {
        let nest: Loop[] = [];
        const stack: { loop: Loop; expanded: boolean }[] = [{ loop: loop, expanded: false }];
        while (stack.length > 0) {
            const top = stack.pop();
            if (top === undefined) {
                break;
            }
            if (top.expanded) {
                nest.push(top.loop);
                continue;
            }
            stack.push({ loop: top.loop, expanded: true });
            const children = this.getChildren(top.loop);
            for (let i = children.length - 1; i >= 0; i--) {
                stack.push({ loop: children[i], expanded: false });
            }
        }
        return nest;
    }

    public toString(): string {
        return this.loops.map(loop => loop.toString()).join('\n');
    }

    private collectMembers(cfg: Cfg, dominance: DominanceFinder, header: BasicBlock, latches: BasicBlock[]): Set<BasicBlock> {
        const found = new Set<BasicBlock>([header]);
        const worklist: BasicBlock[] = [];
        for (const latch of latches) {
            if (!found.has(latch)) {
                found.add(latch);
                worklist.push(latch);
            }
        }
        while (worklist.length > 0) {
            const block = worklist.pop();
            if (block === undefined) {
                break;
            }
            for (const pred of block.getPredecessors()) {
                if (!found.has(pred) && dominance.isReachable(pred)) {
                    found.add(pred);
                    worklist.push(pred);
                }
            }
        }

        // keep the CFG's block order so that member iteration is stable
        const members = new Set<BasicBlock>();
        for (const block of cfg.getBlocks()) {
            if (found.has(block)) {
                members.add(block);
            }
        }
        return members;
    }

    private buildNesting(): void {
        // a parent is the smallest loop strictly containing the child's header
        for (const loop of this.loops) {
            let parent: Loop | undefined;
            for (const candidate of this.loops) {
                if (candidate === loop || !candidate.contains(loop.getHeader())) {
                    continue;
                }
                if (candidate.getBlocks().size <= loop.getBlocks().size) {
                    continue;
                }
                if (!parent || candidate.getBlocks().size < parent.getBlocks().size) {
                    parent = candidate;
                }
            }
            if (parent) {
                loop.setParentId(parent.getId());
                parent.addChildId(loop.getId());
            }
        }

        const bySize = [...this.loops].sort((a, b) => b.getBlocks().size - a.getBlocks().size);
        for (const loop of bySize) {
            const parent = this.getParent(loop);
            loop.setDepth(parent ? parent.getDepth() + 1 : 1);
            for (const block of loop.getBlocks()) {
                this.innermost.set(block, loop);
            }
        }
    }
}

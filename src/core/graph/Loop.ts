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

/**
 * A natural loop record owned by a {@link LoopInfo} arena. Nesting is expressed through loop
 * ids, never through references to other records.
 * @category core/graph
 */
export class Loop {
    private id: number;
    private header: BasicBlock;
    private latches: BasicBlock[];
    private blocks: Set<BasicBlock>;
    private parentId: number | null = null;
    private childIds: number[] = [];
    private depth: number = 1;

    constructor(id: number, header: BasicBlock, latches: BasicBlock[], blocks: Set<BasicBlock>) {
        this.id = id;
        this.header = header;
        this.latches = latches;
        this.blocks = blocks;
    }

    public getId(): number {
        return this.id;
    }

    public getHeader(): BasicBlock {
        return this.header;
    }

    /** Blocks with an edge back to the header. */
    public getLatches(): BasicBlock[] {
        return this.latches;
    }

    public isLatch(block: BasicBlock): boolean {
        return this.latches.includes(block);
    }

    /** All member blocks, including those of nested loops. */
    public getBlocks(): Set<BasicBlock> {
        return this.blocks;
    }

    public contains(block: BasicBlock): boolean {
        return this.blocks.has(block);
    }

    public getParentId(): number | null {
        return this.parentId;
    }

    public setParentId(parentId: number | null): void {
        this.parentId = parentId;
    }

    public getChildIds(): number[] {
        return this.childIds;
    }

    public addChildId(childId: number): void {
        this.childIds.push(childId);
    }

    /** Top-level loops have depth 1. */
    public getDepth(): number {
        return this.depth;
    }

    public setDepth(depth: number): void {
        this.depth = depth;
    }

    /**
     * Returns the member blocks which have at least one successor outside the loop.
     */
    public getExitingBlocks(): BasicBlock[] {
        let exiting: BasicBlock[] = [];
        for (const block of this.blocks) {
            if (block.getSuccessors().some(succ => !this.blocks.has(succ))) {
                exiting.push(block);
            }
        }
        return exiting;
    }

    /**
     * Returns the blocks outside the loop reached by an edge from a member block.
     */
    public getExitBlocks(): BasicBlock[] {
        let exits: BasicBlock[] = [];
        for (const block of this.blocks) {
            for (const succ of block.getSuccessors()) {
                if (!this.blocks.has(succ) && !exits.includes(succ)) {
                    exits.push(succ);
                }
            }
        }
        return exits;
    }

    public toString(): string {
        return `loop#${this.id} at ${this.header.getLabel()} (depth ${this.depth}, ${this.blocks.size} blocks)`;
    }
}

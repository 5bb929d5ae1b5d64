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
import { UNNAMED_STMT } from '../common/Const';
import { BasicBlock } from './BasicBlock';

/**
 * A block on a loop path. `subLoopExit` marks blocks belonging to a nested loop, which the
 * path crosses without looking inside.
 * @category core/graph
 */
export class PathNode {
    private block: BasicBlock;
    private subLoopExit: boolean;

    constructor(block: BasicBlock, subLoopExit: boolean) {
        this.block = block;
        this.subLoopExit = subLoopExit;
    }

    public getBlock(): BasicBlock {
        return this.block;
    }

    public isSubLoopExit(): boolean {
        return this.subLoopExit;
    }
}

/**
 * An acyclic path inside one loop, running from the header or a migration point to a
 * backedge or a migration point.
 * @category core/graph
 */
export class LoopPath {
    private nodes: PathNode[] = [];
    private start: Stmt;
    private end: Stmt;
    private startsAtHeader: boolean;
    private endsAtBackedge: boolean;

    constructor(nodes: PathNode[], start: Stmt, end: Stmt, startsAtHeader: boolean, endsAtBackedge: boolean) {
        if (nodes.length === 0) {
            throw new Error('Trivial path.');
        }
        for (const node of nodes) {
            if (!this.contains(node.getBlock())) {
                this.nodes.push(node);
            }
        }
        this.start = start;
        this.end = end;
        this.startsAtHeader = startsAtHeader;
        this.endsAtBackedge = endsAtBackedge;
    }

    public getNodes(): PathNode[] {
        return this.nodes;
    }

    public getBlocks(): BasicBlock[] {
        return this.nodes.map(node => node.getBlock());
    }

    public getStart(): Stmt {
        return this.start;
    }

    public getEnd(): Stmt {
        return this.end;
    }

    public isStartsAtHeader(): boolean {
        return this.startsAtHeader;
    }

    public isEndsAtBackedge(): boolean {
        return this.endsAtBackedge;
    }

    public contains(block: BasicBlock): boolean {
        return this.nodes.some(node => node.getBlock() === block);
    }

    /** Header to backedge, with no migration point on the way. */
    public isSpanningPath(): boolean {
        return this.startsAtHeader && this.endsAtBackedge;
    }

    public isEqPointPath(): boolean {
        return !this.endsAtBackedge;
    }

    public toString(): string {
        let strs: string[] = [];
        strs.push(`Path with ${this.nodes.length} node(s)\n`);
        strs.push(`  Start: ${LoopPath.stmtName(this.start)}\n`);
        strs.push(`  End: ${LoopPath.stmtName(this.end)}\n`);
        strs.push('  Nodes:\n');
        for (const node of this.nodes) {
            strs.push('    ' + node.getBlock().getLabel());
            if (node.isSubLoopExit()) {
                strs.push(' (sub-loop exit)');
            }
            strs.push('\n');
        }
        return strs.join('');
    }

    private static stmtName(stmt: Stmt): string {
        const def = stmt.getDef();
        if (def !== null && def.hasName()) {
            return def.getName();
        }
        return UNNAMED_STMT;
    }
}

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

import { PhiExpr } from '../base/Expr';
import { Local } from '../base/Local';
import { Parameter } from '../base/Parameter';
import { AssignStmt, Stmt } from '../base/Stmt';
import { Value } from '../base/Value';
import { BasicBlock } from '../graph/BasicBlock';
import { Cfg } from '../graph/Cfg';
import Logger, { LOG_MODULE_TYPE } from '../../utils/logger';
const logger = Logger.getLogger(LOG_MODULE_TYPE.MIGRATION_ANALYZER, 'LiveValues');

/**
 * @category core/dataflow
 */
export interface LivenessProvider {
    /** Values live immediately after `stmt`. The caller owns the returned set. */
    liveValuesAfter(stmt: Stmt): Set<Value>;
}

function isVariable(value: Value): value is Local | Parameter {
    return value instanceof Local || value instanceof Parameter;
}

function isPhi(stmt: Stmt): stmt is AssignStmt {
    return stmt instanceof AssignStmt && stmt.getRightOp() instanceof PhiExpr;
}

/**
 * Backward liveness of locals and parameters over the CFG. Arguments of a phi are live at the
 * end of the matching incoming block, not at the top of the phi's block.
 *
 * Block-level sets are solved once; statement-level queries walk the block backwards from its
 * live-out set, so statements inserted after construction are taken into account as long as
 * the block structure does not change.
 * @category core/dataflow
 */
export class LiveValues implements LivenessProvider {
    private cfg: Cfg;
    private liveIn: Map<BasicBlock, Set<Value>> = new Map();
    private liveOut: Map<BasicBlock, Set<Value>> = new Map();

    constructor(cfg: Cfg) {
        this.cfg = cfg;
        this.solve();
    }

    public getLiveIn(block: BasicBlock): Set<Value> {
        return new Set(this.liveIn.get(block));
    }

    public getLiveOut(block: BasicBlock): Set<Value> {
        return new Set(this.liveOut.get(block));
    }

    public liveValuesAfter(stmt: Stmt): Set<Value> {
        const block = this.cfg.getBlockOf(stmt);
        if (!block) {
            throw new Error(`Statement ${stmt.toString()} is not in the cfg.`);
        }
        const live = new Set(this.liveOut.get(block));
        const stmts = block.getStmts();
        const index = stmts.indexOf(stmt);
        for (let i = stmts.length - 1; i > index; i--) {
            LiveValues.transfer(stmts[i], live);
        }
        return live;
    }

    private solve(): void {
        const blocks = Array.from(this.cfg.getBlocks());
        for (const block of blocks) {
            this.liveIn.set(block, new Set());
            this.liveOut.set(block, new Set());
        }

        let isChanged = true;
        let rounds = 0;
        while (isChanged) {
            isChanged = false;
            rounds++;
            for (let i = blocks.length - 1; i >= 0; i--) {
                const block = blocks[i];
                const out = new Set<Value>();
                for (const succ of block.getSuccessors()) {
                    this.liveIn.get(succ)?.forEach(value => out.add(value));
                    LiveValues.phiUses(succ, block).forEach(value => out.add(value));
                }

                const live = new Set(out);
                const stmts = block.getStmts();
                for (let j = stmts.length - 1; j >= 0; j--) {
                    LiveValues.transfer(stmts[j], live);
                }

                if (!LiveValues.sameSet(out, this.liveOut.get(block)) || !LiveValues.sameSet(live, this.liveIn.get(block))) {
                    this.liveOut.set(block, out);
                    this.liveIn.set(block, live);
                    isChanged = true;
                }
            }
        }
        logger.debug(`liveness converged after ${rounds} rounds`);
    }

    private static transfer(stmt: Stmt, live: Set<Value>): void {
        const def = stmt.getDef();
        if (def !== null) {
            live.delete(def);
        }
        if (isPhi(stmt)) {
            return;
        }
        for (const use of stmt.getUses()) {
            if (isVariable(use)) {
                live.add(use);
            }
        }
    }

    private static phiUses(block: BasicBlock, incoming: BasicBlock): Value[] {
        let uses: Value[] = [];
        for (const stmt of block.getStmts()) {
            if (!isPhi(stmt)) {
                continue;
            }
            const phi = stmt.getRightOp();
            if (!(phi instanceof PhiExpr)) {
                continue;
            }
            const value = phi.getIncomingValue(incoming);
            if (value !== undefined && isVariable(value)) {
                uses.push(value);
            }
        }
        return uses;
    }

    private static sameSet(a: Set<Value>, b: Set<Value> | undefined): boolean {
        if (!b || a.size !== b.size) {
            return false;
        }
        for (const value of a) {
            if (!b.has(value)) {
                return false;
            }
        }
        return true;
    }
}

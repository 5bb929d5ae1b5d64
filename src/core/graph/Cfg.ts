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
import { AnalysisError, AnalysisErrorCode } from '../common/AnalysisError';
import { BasicBlock } from './BasicBlock';
import Logger, { LOG_MODULE_TYPE } from '../../utils/logger';
const logger = Logger.getLogger(LOG_MODULE_TYPE.MIGRATION_ANALYZER, 'Cfg');

/**
 * @category core/graph
 */
export class Cfg {
    private blocks: Set<BasicBlock> = new Set();
    private stmtToBlock: Map<Stmt, BasicBlock> = new Map();
    private startingBlock?: BasicBlock;

    constructor() {}

    public getStmts(): Stmt[] {
        let stmts = new Array<Stmt>();
        for (const block of this.blocks) {
            stmts.push(...block.getStmts());
        }
        return stmts;
    }

    /**
     * Inserts toInsert in the basic block in CFG after point.
     * @returns The number of successfully inserted statements
     */
    public insertAfter(toInsert: Stmt | Stmt[], point: Stmt): number {
        const block = this.stmtToBlock.get(point);
        if (!block) {
            return 0;
        }

        this.updateStmt2BlockMap(block, toInsert);
        return block.insertAfter(toInsert, point);
    }

    /**
     * Inserts toInsert in the basic block in CFG before point.
     * @returns The number of successfully inserted statements
     */
    public insertBefore(toInsert: Stmt | Stmt[], point: Stmt): number {
        const block = this.stmtToBlock.get(point);
        if (!block) {
            return 0;
        }

        this.updateStmt2BlockMap(block, toInsert);
        return block.insertBefore(toInsert, point);
    }

    /**
     * Removes the given stmt from the basic block in CFG.
     */
    public remove(stmt: Stmt): void {
        const block = this.stmtToBlock.get(stmt);
        if (!block) {
            return;
        }
        this.stmtToBlock.delete(stmt);
        block.remove(stmt);
    }

    /**
     * Update stmtToBlock Map
     */
    public updateStmt2BlockMap(block: BasicBlock, changed?: Stmt | Stmt[]): void {
        if (!changed) {
            for (const stmt of block.getStmts()) {
                this.stmtToBlock.set(stmt, block);
                stmt.setCfg(this);
            }
        } else if (changed instanceof Stmt) {
            this.stmtToBlock.set(changed, block);
            changed.setCfg(this);
        } else {
            for (const insert of changed) {
                this.stmtToBlock.set(insert, block);
                insert.setCfg(this);
            }
        }
    }

    /**
     * Adds a block to the CFG. Blocks are numbered in insertion order and the first block added
     * becomes the starting block unless one is set explicitly.
     */
    public addBlock(block: BasicBlock): void {
        block.setId(this.blocks.size);
        this.blocks.add(block);
        if (!this.startingBlock) {
            this.startingBlock = block;
        }
        this.updateStmt2BlockMap(block);
    }

    public addEdge(from: BasicBlock, to: BasicBlock): void {
        from.addSuccessorBlock(to);
        to.addPredecessorBlock(from);
    }

    public getBlocks(): Set<BasicBlock> {
        return this.blocks;
    }

    public getBlockOf(stmt: Stmt): BasicBlock | undefined {
        return this.stmtToBlock.get(stmt);
    }

    public getStartingBlock(): BasicBlock | undefined {
        return this.startingBlock;
    }

    public setStartingBlock(block: BasicBlock): void {
        this.startingBlock = block;
    }

    public getStartingStmt(): Stmt | null {
        return this.startingBlock ? this.startingBlock.getHead() : null;
    }

    public validate(): AnalysisError {
        if (!this.startingBlock || !this.blocks.has(this.startingBlock)) {
            let errMsg = 'Starting block is not in the cfg.';
            logger.error(errMsg);
            return { errCode: AnalysisErrorCode.CFG_NOT_FOUND_START_BLOCK, errMsg: errMsg };
        }
        for (const block of this.blocks) {
            const result = block.validate();
            if (result.errCode !== AnalysisErrorCode.OK) {
                return result;
            }
        }
        return { errCode: AnalysisErrorCode.OK };
    }

    public toString(): string {
        let strs: string[] = [];
        for (const block of this.blocks) {
            strs.push(block.getLabel() + ':\n');
            strs.push(block.toString());
        }
        return strs.join('');
    }
}

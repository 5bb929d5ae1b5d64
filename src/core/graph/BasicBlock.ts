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
import { UNNAMED_BLOCK } from '../common/Const';
import Logger, { LOG_MODULE_TYPE } from '../../utils/logger';
const logger = Logger.getLogger(LOG_MODULE_TYPE.MIGRATION_ANALYZER, 'BasicBlock');

/**
 * @category core/graph
 * A `BasicBlock` is composed of:
 * - ID: a **number** that uniquely identify the basic block, initialized as -1.
 * - Label: an optional **string** name, stable across analysis runs.
 * - Statements: an **array** of statements in the basic block, the last one being its terminator.
 * - Predecessors:  an **array** of basic blocks in front of the current basic block. More accurately, these basic blocks can reach the current block through edges.
 * - Successors: an **array** of basic blocks after the current basic block. More accurately, the current block can reach these basic blocks through edges.
 */
export class BasicBlock {
    private id: number = -1;
    private label: string;
    private stmts: Stmt[] = [];
    private predecessorBlocks: BasicBlock[] = [];
    private successorBlocks: BasicBlock[] = [];

    constructor(label: string = '') {
        this.label = label;
    }

    public getId(): number {
        return this.id;
    }

    public setId(id: number): void {
        this.id = id;
    }

    public getLabel(): string {
        return this.label.length > 0 ? this.label : UNNAMED_BLOCK;
    }

    public hasLabel(): boolean {
        return this.label.length > 0;
    }

    public setLabel(label: string): void {
        this.label = label;
    }

    /**
     * Returns an array of the statements in a basic block.
     * @returns An array of statements in a basic block.
     */
    public getStmts(): Stmt[] {
        return this.stmts;
    }

    public addStmt(stmt: Stmt): void {
        this.stmts.push(stmt);
    }

    /**
     * Inserts toInsert in the basic block after point.
     * @returns The number of successfully inserted statements
     */
    public insertAfter(toInsert: Stmt | Stmt[], point: Stmt): number {
        let index = this.stmts.indexOf(point);
        if (index < 0) {
            return 0;
        }
        return this.insertPos(index + 1, toInsert);
    }

    /**
     * Inserts toInsert in the basic block before point.
     * @returns The number of successfully inserted statements
     */
    public insertBefore(toInsert: Stmt | Stmt[], point: Stmt): number {
        let index = this.stmts.indexOf(point);
        if (index < 0) {
            return 0;
        }
        return this.insertPos(index, toInsert);
    }

    /**
     * Removes the given stmt from this basic block.
     */
    public remove(stmt: Stmt): void {
        let index = this.stmts.indexOf(stmt);
        if (index < 0) {
            return;
        }
        this.stmts.splice(index, 1);
    }

    public getHead(): Stmt | null {
        if (this.stmts.length === 0) {
            return null;
        }
        return this.stmts[0];
    }

    public getTail(): Stmt | null {
        let size = this.stmts.length;
        if (size === 0) {
            return null;
        }
        return this.stmts[size - 1];
    }

    /**
     * Returns the terminator of the block, or **null** for a block which is still being built.
     */
    public getTerminator(): Stmt | null {
        const tail = this.getTail();
        if (tail !== null && tail.isTerminator()) {
            return tail;
        }
        return null;
    }

    /**
     * Returns the statement following `stmt` in this block, or **null** if `stmt` is the last one.
     */
    public getNextStmt(stmt: Stmt): Stmt | null {
        const index = this.stmts.indexOf(stmt);
        if (index < 0 || index + 1 >= this.stmts.length) {
            return null;
        }
        return this.stmts[index + 1];
    }

    /**
     * Returns successors of the current basic block, whose types are also basic blocks (i.e.{@link BasicBlock}).
     * @returns Successors of the current basic block.
     * @example
     * 1. get block successors.

    ```typescript
    for (const block of routine.getCfg().getBlocks()) {
        for (const next of block.getSuccessors()) {
        ...
        }
    }
    ```
     */
    public getSuccessors(): BasicBlock[] {
        return this.successorBlocks;
    }

    /**
     * Returns predecessors of the current basic block, whose types are also basic blocks.
     * @returns An array of basic blocks.
     */
    public getPredecessors(): BasicBlock[] {
        return this.predecessorBlocks;
    }

    public addPredecessorBlock(block: BasicBlock): void {
        this.predecessorBlocks.push(block);
    }

    public addSuccessorBlock(block: BasicBlock): void {
        this.successorBlocks.push(block);
    }

    public toString(): string {
        let strs: string[] = [];
        for (const stmt of this.stmts) {
            strs.push(stmt.toString() + '\n');
        }
        return strs.join('');
    }

    public validate(): AnalysisError {
        let terminators: Stmt[] = [];
        for (const stmt of this.stmts) {
            if (stmt.isTerminator()) {
                terminators.push(stmt);
            }
        }

        if (terminators.length === 0) {
            let errMsg = `Block ${this.getLabel()} has no terminator.`;
            logger.error(errMsg);
            return { errCode: AnalysisErrorCode.BB_MISSING_TERMINATOR, errMsg: errMsg };
        }

        if (terminators.length > 1) {
            let errMsg = `More than one terminator in the block: ${terminators.map((value) => value.toString()).join('\n')}`;
            logger.error(errMsg);
            return { errCode: AnalysisErrorCode.BB_MORE_THAN_ONE_TERMINATOR, errMsg: errMsg };
        }

        if (terminators[0] !== this.stmts[this.stmts.length - 1]) {
            let errMsg = `${terminators[0].toString()} not at the end of block.`;
            logger.error(errMsg);
            return { errCode: AnalysisErrorCode.BB_TERMINATOR_NOT_AT_END, errMsg: errMsg };
        }

        return { errCode: AnalysisErrorCode.OK };
    }

    private insertPos(index: number, toInsert: Stmt | Stmt[]): number {
        if (toInsert instanceof Stmt) {
            this.stmts.splice(index, 0, toInsert);
            return 1;
        }
        this.stmts.splice(index, 0, ...toInsert);
        return toInsert.length;
    }
}

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

import type { Cfg } from '../graph/Cfg';
import { AbstractExpr, InvokeExpr } from './Expr';
import { Local } from './Local';
import { DEFAULT_VALUE_FORMATTER, Value, ValueFormatter } from './Value';

/**
 * @category core/base/stmt
 */
export abstract class Stmt {
    protected cfg?: Cfg;

    /** Return a list of values which are used in this statement */
    public getUses(): Value[] {
        return [];
    }

    /**
     * Return the local defined by this statement. Only an {@link AssignStmt} defines a local,
     * every other statement returns **null**.
     * @example
     * 1. collect the locals defined in a block.

    ```typescript
    for (const stmt of block.getStmts()) {
        const def = stmt.getDef();
        if (def !== null) {
            ...
        }
    }
    ```
     */
    public getDef(): Local | null {
        return null;
    }

    public getDefAndUses(): Value[] {
        const defAndUses: Value[] = [];
        const def = this.getDef();
        if (def) {
            defAndUses.push(def);
        }
        defAndUses.push(...this.getUses());
        return defAndUses;
    }

    /**
     * Get the CFG in which the statement is. Statements which have not been added to a block
     * yet return **undefined**.
     */
    public getCfg(): Cfg | undefined {
        return this.cfg;
    }

    public setCfg(cfg: Cfg): void {
        this.cfg = cfg;
    }

    /**
     * Return true if the statement ends its basic block. The successors of a terminator are
     * the successors of its block.
     */
    public isTerminator(): boolean {
        return false;
    }

    /** Return the number of blocks which this statement may go to */
    public getExpectedSuccessorCount(): number {
        return 1;
    }

    public containsInvokeExpr(): boolean {
        return this.getInvokeExpr() !== undefined;
    }

    /**
     * Returns the invocation expression of the current statement, or **undefined** if the
     * statement is not a call site.
     * @example
     * 1. find the callee of a call site.

    ```typescript
    let invoke = stmt.getInvokeExpr();
    if (invoke) {
        const calleeName = invoke.getSignature().getName();
    }
    ```
     */
    public getInvokeExpr(): InvokeExpr | undefined {
        for (const use of this.getUses()) {
            if (use instanceof InvokeExpr) {
                return use;
            }
        }
        return undefined;
    }

    public getExprs(): AbstractExpr[] {
        let exprs: AbstractExpr[] = [];
        for (const use of this.getUses()) {
            if (use instanceof AbstractExpr) {
                exprs.push(use);
            }
        }
        return exprs;
    }

    /** Renders the statement, naming values through `fmt`. */
    abstract toText(fmt: ValueFormatter): string;

    public toString(): string {
        return this.toText(DEFAULT_VALUE_FORMATTER);
    }
}

function formatOperand(value: Value, fmt: ValueFormatter): string {
    if (value instanceof AbstractExpr) {
        return value.toText(fmt);
    }
    return fmt(value);
}

/**
 * `leftOp = rightOp`. The left operand is always a fresh SSA local whose declaring statement
 * becomes this statement.
 * @category core/base/stmt
 */
export class AssignStmt extends Stmt {
    private leftOp: Local;
    private rightOp: Value;

    constructor(leftOp: Local, rightOp: Value) {
        super();
        this.leftOp = leftOp;
        this.rightOp = rightOp;
        leftOp.setDeclaringStmt(this);
    }

    public getLeftOp(): Local {
        return this.leftOp;
    }

    public getRightOp(): Value {
        return this.rightOp;
    }

    public setRightOp(rightOp: Value): void {
        this.rightOp = rightOp;
    }

    public getDef(): Local {
        return this.leftOp;
    }

    public getUses(): Value[] {
        let uses: Value[] = [];
        uses.push(this.rightOp);
        uses.push(...this.rightOp.getUses());
        return uses;
    }

    public toText(fmt: ValueFormatter): string {
        return fmt(this.leftOp) + ' = ' + formatOperand(this.rightOp, fmt);
    }
}

/**
 * A call whose result, if any, is discarded.
 * @category core/base/stmt
 */
export class InvokeStmt extends Stmt {
    private invokeExpr: InvokeExpr;

    constructor(invokeExpr: InvokeExpr) {
        super();
        this.invokeExpr = invokeExpr;
    }

    public getInvokeExpr(): InvokeExpr {
        return this.invokeExpr;
    }

    public getUses(): Value[] {
        let uses: Value[] = [];
        uses.push(this.invokeExpr);
        uses.push(...this.invokeExpr.getUses());
        return uses;
    }

    public toText(fmt: ValueFormatter): string {
        return this.invokeExpr.toText(fmt);
    }
}

/**
 * @category core/base/stmt
 */
export class StoreStmt extends Stmt {
    private value: Value;
    private ptr: Value;

    constructor(value: Value, ptr: Value) {
        super();
        this.value = value;
        this.ptr = ptr;
    }

    public getValue(): Value {
        return this.value;
    }

    public getPtr(): Value {
        return this.ptr;
    }

    public getUses(): Value[] {
        let uses: Value[] = [];
        uses.push(this.value);
        uses.push(...this.value.getUses());
        uses.push(this.ptr);
        uses.push(...this.ptr.getUses());
        return uses;
    }

    public toText(fmt: ValueFormatter): string {
        return 'store ' + fmt(this.value) + ', ' + fmt(this.ptr);
    }
}

/**
 * @category core/base/stmt
 */
export abstract class TerminatorStmt extends Stmt {
    public isTerminator(): boolean {
        return true;
    }
}

/**
 * Unconditional jump to the only successor of the block.
 * @category core/base/stmt
 */
export class GotoStmt extends TerminatorStmt {
    public toText(): string {
        return 'goto';
    }
}

/**
 * Conditional jump: the first successor of the block is taken when `condition` is true,
 * the second one otherwise.
 * @category core/base/stmt
 */
export class IfStmt extends TerminatorStmt {
    private condition: Value;

    constructor(condition: Value) {
        super();
        this.condition = condition;
    }

    public getCondition(): Value {
        return this.condition;
    }

    public getExpectedSuccessorCount(): number {
        return 2;
    }

    public getUses(): Value[] {
        let uses: Value[] = [];
        uses.push(this.condition);
        uses.push(...this.condition.getUses());
        return uses;
    }

    public toText(fmt: ValueFormatter): string {
        return 'if ' + fmt(this.condition);
    }
}

/**
 * Multi-way jump: successor `i` of the block is taken for `caseValues[i]`, the last
 * successor is the default target.
 * @category core/base/stmt
 */
export class SwitchStmt extends TerminatorStmt {
    private key: Value;
    private caseValues: Value[];

    constructor(key: Value, caseValues: Value[]) {
        super();
        this.key = key;
        this.caseValues = caseValues;
    }

    public getKey(): Value {
        return this.key;
    }

    public getCaseValues(): Value[] {
        return this.caseValues;
    }

    public getExpectedSuccessorCount(): number {
        return this.caseValues.length + 1;
    }

    public getUses(): Value[] {
        let uses: Value[] = [];
        uses.push(this.key);
        uses.push(...this.key.getUses());
        return uses;
    }

    public toText(fmt: ValueFormatter): string {
        return 'switch ' + fmt(this.key) + ' [' + this.caseValues.map(value => fmt(value)).join(', ') + ']';
    }
}

/**
 * @category core/base/stmt
 */
export class ReturnStmt extends TerminatorStmt {
    private op: Value;

    constructor(op: Value) {
        super();
        this.op = op;
    }

    public getOp(): Value {
        return this.op;
    }

    public getExpectedSuccessorCount(): number {
        return 0;
    }

    public getUses(): Value[] {
        let uses: Value[] = [];
        uses.push(this.op);
        uses.push(...this.op.getUses());
        return uses;
    }

    public toText(fmt: ValueFormatter): string {
        return 'return ' + fmt(this.op);
    }
}

/**
 * @category core/base/stmt
 */
export class ReturnVoidStmt extends TerminatorStmt {
    public getExpectedSuccessorCount(): number {
        return 0;
    }

    public toText(): string {
        return 'return';
    }
}

/**
 * @category core/base/stmt
 */
export class UnreachableStmt extends TerminatorStmt {
    public getExpectedSuccessorCount(): number {
        return 0;
    }

    public toText(): string {
        return 'unreachable';
    }
}

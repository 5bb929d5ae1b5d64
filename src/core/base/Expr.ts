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

import type { BasicBlock } from '../graph/BasicBlock';
import { RoutineSignature } from '../model/RoutineSignature';
import { IntType, PointerType, Type, UnknownType, VectorType } from './Type';
import { DEFAULT_VALUE_FORMATTER, Value, ValueFormatter } from './Value';

/**
 * @category core/base/expr
 */
export abstract class AbstractExpr implements Value {
    abstract getUses(): Value[];

    abstract getType(): Type;

    /** Renders the expression, naming operands through `fmt`. */
    abstract toText(fmt: ValueFormatter): string;

    public toString(): string {
        return this.toText(DEFAULT_VALUE_FORMATTER);
    }
}

/**
 * A call of a routine or declaration. An invoke that may unwind transfers control
 * to an unwinding edge instead of returning to the next statement.
 * @category core/base/expr
 */
export class InvokeExpr extends AbstractExpr {
    private signature: RoutineSignature;
    private args: Value[];
    private unwinding: boolean;

    constructor(signature: RoutineSignature, args: Value[], unwinding: boolean = false) {
        super();
        this.signature = signature;
        this.args = args;
        this.unwinding = unwinding;
    }

    public getSignature(): RoutineSignature {
        return this.signature;
    }

    public setSignature(newSignature: RoutineSignature): void {
        this.signature = newSignature;
    }

    public getArg(index: number): Value {
        return this.args[index];
    }

    public getArgs(): Value[] {
        return this.args;
    }

    public setArgs(newArgs: Value[]): void {
        this.args = newArgs;
    }

    /**
     * Returns true if the callee may transfer control without returning to the
     * statement following the call.
     */
    public mayUnwind(): boolean {
        return this.unwinding;
    }

    public getUses(): Value[] {
        let uses: Value[] = [];
        uses.push(...this.args);
        for (const arg of this.args) {
            uses.push(...arg.getUses());
        }
        return uses;
    }

    public getType(): Type {
        return this.signature.getReturnType();
    }

    public toText(fmt: ValueFormatter): string {
        let strs: string[] = [];
        strs.push(this.unwinding ? 'invoke ' : 'call ');
        strs.push(this.signature.getReturnType().toString());
        strs.push(' @' + this.signature.getName() + '(');
        strs.push(this.args.map(arg => fmt(arg)).join(', '));
        strs.push(')');
        return strs.join('');
    }
}

export enum BinaryOperator {
    ADD = 'add',
    SUB = 'sub',
    MUL = 'mul',
    DIV = 'div',
    REM = 'rem',
    AND = 'and',
    OR = 'or',
    XOR = 'xor',
    SHL = 'shl',
    SHR = 'shr',
    EQ = 'eq',
    NE = 'ne',
    LT = 'lt',
    LE = 'le',
    GT = 'gt',
    GE = 'ge',
}

const COMPARISON_OPERATORS: ReadonlySet<BinaryOperator> = new Set([
    BinaryOperator.EQ,
    BinaryOperator.NE,
    BinaryOperator.LT,
    BinaryOperator.LE,
    BinaryOperator.GT,
    BinaryOperator.GE,
]);

/**
 * @category core/base/expr
 */
export class BinopExpr extends AbstractExpr {
    private operator: BinaryOperator;
    private op1: Value;
    private op2: Value;

    constructor(operator: BinaryOperator, op1: Value, op2: Value) {
        super();
        this.operator = operator;
        this.op1 = op1;
        this.op2 = op2;
    }

    public getOperator(): BinaryOperator {
        return this.operator;
    }

    public getOp1(): Value {
        return this.op1;
    }

    public getOp2(): Value {
        return this.op2;
    }

    public getUses(): Value[] {
        let uses: Value[] = [];
        uses.push(this.op1);
        uses.push(...this.op1.getUses());
        uses.push(this.op2);
        uses.push(...this.op2.getUses());
        return uses;
    }

    public getType(): Type {
        if (COMPARISON_OPERATORS.has(this.operator)) {
            return IntType.getInstance(1);
        }
        return this.op1.getType();
    }

    public toText(fmt: ValueFormatter): string {
        return this.operator + ' ' + fmt(this.op1) + ', ' + fmt(this.op2);
    }
}

export enum CastOperator {
    BITCAST = 'bitcast',
    TRUNC = 'trunc',
    ZEXT = 'zext',
    SEXT = 'sext',
    FPTOSI = 'fptosi',
    SITOFP = 'sitofp',
    PTRTOINT = 'ptrtoint',
    INTTOPTR = 'inttoptr',
}

/**
 * @category core/base/expr
 */
export class CastExpr extends AbstractExpr {
    private operator: CastOperator;
    private op: Value;
    private type: Type;

    constructor(operator: CastOperator, op: Value, type: Type) {
        super();
        this.operator = operator;
        this.op = op;
        this.type = type;
    }

    public getOperator(): CastOperator {
        return this.operator;
    }

    public getOp(): Value {
        return this.op;
    }

    /** A bitcast reinterprets the representation of its operand without changing the bits. */
    public isReinterpretation(): boolean {
        return this.operator === CastOperator.BITCAST;
    }

    public getUses(): Value[] {
        let uses: Value[] = [];
        uses.push(this.op);
        uses.push(...this.op.getUses());
        return uses;
    }

    public getType(): Type {
        return this.type;
    }

    public toText(fmt: ValueFormatter): string {
        return this.operator + ' ' + fmt(this.op) + ' to ' + this.type.toString();
    }
}

/**
 * @category core/base/expr
 */
export class AllocaExpr extends AbstractExpr {
    private allocatedType: Type;

    constructor(allocatedType: Type) {
        super();
        this.allocatedType = allocatedType;
    }

    public getAllocatedType(): Type {
        return this.allocatedType;
    }

    public getUses(): Value[] {
        return [];
    }

    public getType(): Type {
        return new PointerType(this.allocatedType);
    }

    public toText(): string {
        return 'alloca ' + this.allocatedType.toString();
    }
}

/**
 * @category core/base/expr
 */
export class LoadExpr extends AbstractExpr {
    private ptr: Value;
    private type: Type;

    constructor(ptr: Value, type: Type) {
        super();
        this.ptr = ptr;
        this.type = type;
    }

    public getPtr(): Value {
        return this.ptr;
    }

    public getUses(): Value[] {
        let uses: Value[] = [];
        uses.push(this.ptr);
        uses.push(...this.ptr.getUses());
        return uses;
    }

    public getType(): Type {
        return this.type;
    }

    public toText(fmt: ValueFormatter): string {
        return 'load ' + this.type.toString() + ', ' + fmt(this.ptr);
    }
}

/**
 * SSA merge. `args[i]` flows in from `blocks[i]`.
 * @category core/base/expr
 */
export class PhiExpr extends AbstractExpr {
    private args: Value[] = [];
    private blocks: BasicBlock[] = [];
    private type: Type;

    constructor(type: Type = UnknownType.getInstance()) {
        super();
        this.type = type;
    }

    public addIncoming(value: Value, block: BasicBlock): void {
        this.args.push(value);
        this.blocks.push(block);
    }

    public getArgs(): Value[] {
        return this.args;
    }

    public getIncomingBlocks(): BasicBlock[] {
        return this.blocks;
    }

    public getIncomingValue(block: BasicBlock): Value | undefined {
        const index = this.blocks.indexOf(block);
        return index < 0 ? undefined : this.args[index];
    }

    public getUses(): Value[] {
        let uses: Value[] = [];
        for (const arg of this.args) {
            uses.push(arg);
            uses.push(...arg.getUses());
        }
        return uses;
    }

    public getType(): Type {
        return this.type;
    }

    public toText(fmt: ValueFormatter): string {
        let strs: string[] = [];
        for (let i = 0; i < this.args.length; i++) {
            strs.push(`[${fmt(this.args[i])}, ${this.blocks[i].getLabel()}]`);
        }
        return 'phi ' + this.type.toString() + ' ' + strs.join(', ');
    }
}

/**
 * Base of the operations that select or combine parts of a structured value. The result of
 * such an operation may stay live while the values it was computed from do not, even though
 * those values are still required to rebuild the result.
 * @category core/base/expr
 */
export abstract class AbstractStructuralExpr extends AbstractExpr {
    /** Returns the operands this operation reads, in operand order. */
    abstract getOperands(): Value[];

    public getUses(): Value[] {
        let uses: Value[] = [];
        for (const op of this.getOperands()) {
            uses.push(op);
            uses.push(...op.getUses());
        }
        return uses;
    }
}

/**
 * Address of a member or element reached from `base` through `indices`.
 * @category core/base/expr
 */
export class FieldAddrExpr extends AbstractStructuralExpr {
    private base: Value;
    private indices: Value[];
    private type: Type;

    constructor(base: Value, indices: Value[], type: Type = new PointerType()) {
        super();
        this.base = base;
        this.indices = indices;
        this.type = type;
    }

    public getBase(): Value {
        return this.base;
    }

    public getIndices(): Value[] {
        return this.indices;
    }

    public getOperands(): Value[] {
        return [this.base, ...this.indices];
    }

    public getType(): Type {
        return this.type;
    }

    public toText(fmt: ValueFormatter): string {
        return 'fieldaddr ' + this.getOperands().map(op => fmt(op)).join(', ');
    }
}

/**
 * @category core/base/expr
 */
export class ExtractElementExpr extends AbstractStructuralExpr {
    private vector: Value;
    private index: Value;

    constructor(vector: Value, index: Value) {
        super();
        this.vector = vector;
        this.index = index;
    }

    public getVector(): Value {
        return this.vector;
    }

    public getIndex(): Value {
        return this.index;
    }

    public getOperands(): Value[] {
        return [this.vector, this.index];
    }

    public getType(): Type {
        const vectorType = this.vector.getType();
        if (vectorType instanceof VectorType) {
            return vectorType.getElementType();
        }
        return UnknownType.getInstance();
    }

    public toText(fmt: ValueFormatter): string {
        return 'extractelement ' + fmt(this.vector) + ', ' + fmt(this.index);
    }
}

/**
 * @category core/base/expr
 */
export class InsertElementExpr extends AbstractStructuralExpr {
    private vector: Value;
    private element: Value;
    private index: Value;

    constructor(vector: Value, element: Value, index: Value) {
        super();
        this.vector = vector;
        this.element = element;
        this.index = index;
    }

    public getVector(): Value {
        return this.vector;
    }

    public getElement(): Value {
        return this.element;
    }

    public getIndex(): Value {
        return this.index;
    }

    public getOperands(): Value[] {
        return [this.vector, this.element, this.index];
    }

    public getType(): Type {
        return this.vector.getType();
    }

    public toText(fmt: ValueFormatter): string {
        return 'insertelement ' + this.getOperands().map(op => fmt(op)).join(', ');
    }
}

/**
 * @category core/base/expr
 */
export class ExtractValueExpr extends AbstractStructuralExpr {
    private aggregate: Value;
    private indices: number[];
    private type: Type;

    constructor(aggregate: Value, indices: number[], type: Type = UnknownType.getInstance()) {
        super();
        this.aggregate = aggregate;
        this.indices = indices;
        this.type = type;
    }

    public getAggregate(): Value {
        return this.aggregate;
    }

    public getIndices(): number[] {
        return this.indices;
    }

    public getOperands(): Value[] {
        return [this.aggregate];
    }

    public getType(): Type {
        return this.type;
    }

    public toText(fmt: ValueFormatter): string {
        return 'extractvalue ' + fmt(this.aggregate) + ', ' + this.indices.join(', ');
    }
}

/**
 * @category core/base/expr
 */
export class InsertValueExpr extends AbstractStructuralExpr {
    private aggregate: Value;
    private value: Value;
    private indices: number[];

    constructor(aggregate: Value, value: Value, indices: number[]) {
        super();
        this.aggregate = aggregate;
        this.value = value;
        this.indices = indices;
    }

    public getAggregate(): Value {
        return this.aggregate;
    }

    public getValue(): Value {
        return this.value;
    }

    public getIndices(): number[] {
        return this.indices;
    }

    public getOperands(): Value[] {
        return [this.aggregate, this.value];
    }

    public getType(): Type {
        return this.aggregate.getType();
    }

    public toText(fmt: ValueFormatter): string {
        return 'insertvalue ' + fmt(this.aggregate) + ', ' + fmt(this.value) + ', ' + this.indices.join(', ');
    }
}

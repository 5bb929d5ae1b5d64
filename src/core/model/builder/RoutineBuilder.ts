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

import { InvokeExpr, PhiExpr } from '../../base/Expr';
import { Local } from '../../base/Local';
import { Parameter } from '../../base/Parameter';
import {
    AssignStmt,
    GotoStmt,
    IfStmt,
    InvokeStmt,
    ReturnStmt,
    ReturnVoidStmt,
    Stmt,
    StoreStmt,
    SwitchStmt,
    UnreachableStmt,
} from '../../base/Stmt';
import { Type, VoidType } from '../../base/Type';
import { Value } from '../../base/Value';
import { AnalysisErrorCode } from '../../common/AnalysisError';
import { BasicBlock } from '../../graph/BasicBlock';
import { Cfg } from '../../graph/Cfg';
import { Routine } from '../Routine';
import { RoutineBody } from '../RoutineBody';
import { RoutineSignature } from '../RoutineSignature';

export interface ParameterInfo {
    name: string;
    type: Type;
}

/**
 * Builds a routine block by block. Statements go to the current insertion block; terminators
 * also add the CFG edges to their targets, in successor order.
 *
 * @category core/model
 * @example
 * 1. a counting loop.

```typescript
const builder = new RoutineBuilder('count', [{ name: 'n', type: IntType.getInstance(32) }]);
const entry = builder.addBlock('entry');
const header = builder.addBlock('header');
const exit = builder.addBlock('exit');
builder.setInsertPoint(entry);
builder.goto(header);
builder.setInsertPoint(header);
const done = builder.assign('done', new BinopExpr(BinaryOperator.EQ, builder.getParam('n'), zero));
builder.branch(done, exit, header);
builder.setInsertPoint(exit);
builder.ret();
const routine = builder.build();
```
 */
export class RoutineBuilder {
    private signature: RoutineSignature;
    private parameters: Parameter[];
    private cfg: Cfg = new Cfg();
    private locals: Set<Local> = new Set();
    private blocksByLabel: Map<string, BasicBlock> = new Map();
    private insertBlock?: BasicBlock;

    constructor(name: string, params: ParameterInfo[] = [], returnType: Type = VoidType.getInstance(), variadic: boolean = false) {
        this.signature = new RoutineSignature(name, params.map(param => param.type), returnType, variadic);
        this.parameters = params.map((param, index) => new Parameter(index, param.name, param.type));
    }

    public getSignature(): RoutineSignature {
        return this.signature;
    }

    public getParam(key: number | string): Parameter {
        const param = typeof key === 'number' ? this.parameters[key] : this.parameters.find(p => p.hasName() && p.getName() === key);
        if (!param) {
            throw new Error(`Routine ${this.signature.getName()} has no parameter ${key}.`);
        }
        return param;
    }

    public getCfg(): Cfg {
        return this.cfg;
    }

    /** Adds a new block; the first block added is the entry block. */
    public addBlock(label: string = ''): BasicBlock {
        if (label.length > 0 && this.blocksByLabel.has(label)) {
            throw new Error(`Duplicate block label ${label}.`);
        }
        const block = new BasicBlock(label);
        this.cfg.addBlock(block);
        if (label.length > 0) {
            this.blocksByLabel.set(label, block);
        }
        return block;
    }

    public getBlock(label: string): BasicBlock {
        const block = this.blocksByLabel.get(label);
        if (!block) {
            throw new Error(`No block labelled ${label}.`);
        }
        return block;
    }

    public setInsertPoint(block: BasicBlock): void {
        this.insertBlock = block;
    }

    public getInsertBlock(): BasicBlock {
        if (!this.insertBlock) {
            throw new Error('No insertion block has been set.');
        }
        return this.insertBlock;
    }

    /**
     * Creates a local which is not defined yet, for values referenced before the statement
     * producing them, such as loop-carried phi arguments.
     */
    public newLocal(name: string = '', type?: Type): Local {
        const local = new Local(name, type);
        this.locals.add(local);
        return local;
    }

    /**
     * Appends `def = rightOp`. A string creates a new local of the right operand's type.
     */
    public assign(def: Local | string, rightOp: Value): Local {
        const local = typeof def === 'string' ? this.newLocal(def, rightOp.getType()) : def;
        this.locals.add(local);
        this.append(new AssignStmt(local, rightOp));
        return local;
    }

    /** Appends a call; the result is kept in a local when `def` is given. */
    public call(callee: RoutineSignature, args: Value[], def?: Local | string, unwinding: boolean = false): Stmt {
        const invoke = new InvokeExpr(callee, args, unwinding);
        if (def === undefined) {
            return this.append(new InvokeStmt(invoke));
        }
        const local = this.assign(def, invoke);
        const stmt = local.getDeclaringStmt();
        if (stmt === null) {
            throw new Error(`Local ${local.toString()} has no declaring statement.`);
        }
        return stmt;
    }

    public phi(def: Local | string, type: Type, incoming: [Value, BasicBlock][]): Local {
        const phi = new PhiExpr(type);
        for (const [value, block] of incoming) {
            phi.addIncoming(value, block);
        }
        return this.assign(def, phi);
    }

    public store(value: Value, ptr: Value): Stmt {
        return this.append(new StoreStmt(value, ptr));
    }

    public goto(target: BasicBlock): Stmt {
        return this.terminate(new GotoStmt(), [target]);
    }

    /** Conditional jump: `ifTrue` becomes the first successor. */
    public branch(condition: Value, ifTrue: BasicBlock, ifFalse: BasicBlock): Stmt {
        return this.terminate(new IfStmt(condition), [ifTrue, ifFalse]);
    }

    public switch(key: Value, cases: [Value, BasicBlock][], defaultTarget: BasicBlock): Stmt {
        return this.terminate(new SwitchStmt(key, cases.map(c => c[0])), [...cases.map(c => c[1]), defaultTarget]);
    }

    public ret(value?: Value): Stmt {
        return this.terminate(value === undefined ? new ReturnVoidStmt() : new ReturnStmt(value), []);
    }

    public unreachable(): Stmt {
        return this.terminate(new UnreachableStmt(), []);
    }

    /** Appends any statement to the insertion block. */
    public append(stmt: Stmt): Stmt {
        const block = this.getInsertBlock();
        block.addStmt(stmt);
        this.cfg.updateStmt2BlockMap(block, stmt);
        return stmt;
    }

    /**
     * Validates the CFG and returns the routine.
     * @throws Error if a block is malformed or an assigned local was never defined.
     */
    public build(): Routine {
        const result = this.cfg.validate();
        if (result.errCode !== AnalysisErrorCode.OK) {
            throw new Error(`Invalid routine ${this.signature.getName()}: ${result.errMsg}`);
        }
        for (const local of this.locals) {
            if (local.getDeclaringStmt() === null) {
                throw new Error(`Local ${local.toString()} of routine ${this.signature.getName()} is never defined.`);
            }
        }
        const routine = new Routine(this.signature, this.parameters);
        routine.setBody(new RoutineBody(new Set(this.locals), this.cfg));
        return routine;
    }

    private terminate(stmt: Stmt, targets: BasicBlock[]): Stmt {
        const block = this.getInsertBlock();
        this.append(stmt);
        for (const target of targets) {
            this.cfg.addEdge(block, target);
        }
        return stmt;
    }
}

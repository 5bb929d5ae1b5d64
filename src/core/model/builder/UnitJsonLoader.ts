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

import fs from 'fs';
import { z } from 'zod';
import { FloatConstant, IntConstant, NullConstant } from '../../base/Constant';
import {
    AbstractExpr,
    AllocaExpr,
    BinopExpr,
    CastExpr,
    ExtractElementExpr,
    ExtractValueExpr,
    FieldAddrExpr,
    InsertElementExpr,
    InsertValueExpr,
    LoadExpr,
} from '../../base/Expr';
import { Local } from '../../base/Local';
import { ArrayType, FloatType, IntType, PointerType, StructType, Type, UnknownType, VectorType, VoidType } from '../../base/Type';
import { Value } from '../../base/Value';
import { PTR_KEYWORD, UNKNOWN_KEYWORD, VOID_KEYWORD } from '../../common/Const';
import { BasicBlock } from '../../graph/BasicBlock';
import { CompilationUnit } from '../CompilationUnit';
import { RoutineSignature } from '../RoutineSignature';
import { RoutineBuilder } from './RoutineBuilder';
import { OperandJson, RoutineJson, StmtJson, UnitJson, UnitSchema } from './UnitSchema';
import Logger, { LOG_MODULE_TYPE } from '../../../utils/logger';
const logger = Logger.getLogger(LOG_MODULE_TYPE.MIGRATION_ANALYZER, 'UnitJsonLoader');

/**
 * Parses a type written as in the printed IR. Struct types are shared by name through `structs`.
 */
export function parseType(text: string, structs: Map<string, StructType> = new Map()): Type {
    const type = text.trim();
    if (type === VOID_KEYWORD) {
        return VoidType.getInstance();
    }
    if (type === UNKNOWN_KEYWORD) {
        return UnknownType.getInstance();
    }
    if (type === PTR_KEYWORD) {
        return new PointerType();
    }
    if (type.endsWith('*')) {
        return new PointerType(parseType(type.slice(0, -1), structs));
    }
    let match = /^\[(\d+) x (.+)\]$/.exec(type);
    if (match) {
        return new ArrayType(parseType(match[2], structs), Number(match[1]));
    }
    match = /^<(\d+) x (.+)>$/.exec(type);
    if (match) {
        return new VectorType(parseType(match[2], structs), Number(match[1]));
    }
    match = /^i(\d+)$/.exec(type);
    if (match) {
        return IntType.getInstance(Number(match[1]));
    }
    match = /^f(\d+)$/.exec(type);
    if (match) {
        return FloatType.getInstance(Number(match[1]));
    }
    match = /^%(.+)$/.exec(type);
    if (match) {
        let struct = structs.get(match[1]);
        if (!struct) {
            struct = new StructType(match[1], []);
            structs.set(match[1], struct);
        }
        return struct;
    }
    throw new Error(`Unknown type ${text}.`);
}

function formatIssues(error: z.ZodError): string {
    return error.issues.map(issue => `${issue.path.map(String).join('.') || '$'}: ${issue.message}`).join('; ');
}

/**
 * Builds a {@link CompilationUnit} from its JSON description, validated against
 * {@link UnitSchema}. Routines may call each other in any order.
 * @category core/model
 */
export class UnitJsonLoader {
    private structs: Map<string, StructType> = new Map();

    public loadFile(filePath: string): CompilationUnit {
        logger.info(`load unit from ${filePath}`);
        const text = fs.readFileSync(filePath, 'utf8');
        return this.loadText(text);
    }

    public loadText(text: string): CompilationUnit {
        let data: unknown;
        try {
            data = JSON.parse(text);
        } catch (err) {
            throw new Error(`Invalid unit: ${err instanceof Error ? err.message : String(err)}`);
        }
        return this.load(data);
    }

    /**
     * @throws Error listing every schema violation, or naming the first unresolved reference.
     */
    public load(data: unknown): CompilationUnit {
        const parsed = UnitSchema.safeParse(data);
        if (!parsed.success) {
            const errMsg = `Invalid unit: ${formatIssues(parsed.error)}`;
            logger.error(errMsg);
            throw new Error(errMsg);
        }
        return this.buildUnit(parsed.data);
    }

    private buildUnit(json: UnitJson): CompilationUnit {
        this.structs = new Map();
        const unit = new CompilationUnit(json.name);
        for (const decl of json.declarations) {
            unit.addDeclaration(new RoutineSignature(decl.name, decl.params.map(p => this.type(p)), this.type(decl.returns), decl.variadic));
        }

        const builders: [RoutineBuilder, RoutineJson][] = [];
        for (const routine of json.routines) {
            const params = routine.params.map(p => ({ name: p.name, type: this.type(p.type) }));
            const builder = new RoutineBuilder(routine.name, params, this.type(routine.returns));
            unit.addDeclaration(builder.getSignature());
            builders.push([builder, routine]);
        }
        for (const [builder, routine] of builders) {
            new RoutineBodyLoader(this, unit, builder).load(routine);
            unit.addRoutine(builder.build());
        }
        return unit;
    }

    public type(text: string): Type {
        return parseType(text, this.structs);
    }
}

class RoutineBodyLoader {
    private loader: UnitJsonLoader;
    private unit: CompilationUnit;
    private builder: RoutineBuilder;
    private locals: Map<string, Local> = new Map();

    constructor(loader: UnitJsonLoader, unit: CompilationUnit, builder: RoutineBuilder) {
        this.loader = loader;
        this.unit = unit;
        this.builder = builder;
    }

    public load(routine: RoutineJson): void {
        const blocks = routine.blocks.map(block => this.builder.addBlock(block.label));

        // values may be used before their definition, e.g. by phis in loop headers
        for (const block of routine.blocks) {
            for (const stmt of block.stmts) {
                if (!('def' in stmt) || stmt.def === undefined) {
                    continue;
                }
                if (this.locals.has(stmt.def)) {
                    throw new Error(`Value ${stmt.def} is defined twice in routine ${routine.name}.`);
                }
                const name = stmt.def.startsWith('#') ? '' : stmt.def;
                this.locals.set(stmt.def, this.builder.newLocal(name));
            }
        }

        routine.blocks.forEach((block, index) => {
            this.builder.setInsertPoint(blocks[index]);
            for (const stmt of block.stmts) {
                this.loadStmt(stmt);
            }
        });
    }

    private loadStmt(stmt: StmtJson): void {
        switch (stmt.op) {
            case 'call': {
                const callee = this.unit.getDeclaration(stmt.callee);
                if (!callee) {
                    throw new Error(`Unknown callee ${stmt.callee}.`);
                }
                const args = stmt.args.map(arg => this.operand(arg));
                const def = stmt.def === undefined ? undefined : this.def(stmt.def);
                this.builder.call(callee, args, def, stmt.unwind);
                def?.setType(callee.getReturnType());
                break;
            }
            case 'binop':
                this.assign(stmt.def, new BinopExpr(stmt.operator, this.operand(stmt.lhs), this.operand(stmt.rhs)));
                break;
            case 'cast':
                this.assign(stmt.def, new CastExpr(stmt.operator, this.operand(stmt.value), this.loader.type(stmt.type)));
                break;
            case 'alloca':
                this.assign(stmt.def, new AllocaExpr(this.loader.type(stmt.type)));
                break;
            case 'load':
                this.assign(stmt.def, new LoadExpr(this.operand(stmt.ptr), this.loader.type(stmt.type)));
                break;
            case 'store':
                this.builder.store(this.operand(stmt.value), this.operand(stmt.ptr));
                break;
            case 'phi': {
                const incoming = stmt.incoming.map((inc): [Value, BasicBlock] => [this.operand(inc.value), this.builder.getBlock(inc.block)]);
                const def = this.requireDef(stmt.def, stmt.op);
                this.builder.phi(def, this.loader.type(stmt.type), incoming);
                def.setType(this.loader.type(stmt.type));
                break;
            }
            case 'fieldaddr': {
                const type = stmt.type === undefined ? new PointerType() : this.loader.type(stmt.type);
                this.assign(stmt.def, new FieldAddrExpr(this.operand(stmt.base), stmt.indices.map(i => this.operand(i)), type));
                break;
            }
            case 'extractelement':
                this.assign(stmt.def, new ExtractElementExpr(this.operand(stmt.vector), this.operand(stmt.index)));
                break;
            case 'insertelement':
                this.assign(stmt.def, new InsertElementExpr(this.operand(stmt.vector), this.operand(stmt.element), this.operand(stmt.index)));
                break;
            case 'extractvalue': {
                const type = stmt.type === undefined ? UnknownType.getInstance() : this.loader.type(stmt.type);
                this.assign(stmt.def, new ExtractValueExpr(this.operand(stmt.aggregate), stmt.indices, type));
                break;
            }
            case 'insertvalue':
                this.assign(stmt.def, new InsertValueExpr(this.operand(stmt.aggregate), this.operand(stmt.value), stmt.indices));
                break;
            case 'goto':
                this.builder.goto(this.builder.getBlock(stmt.target));
                break;
            case 'if':
                this.builder.branch(this.operand(stmt.cond), this.builder.getBlock(stmt.then), this.builder.getBlock(stmt.else));
                break;
            case 'switch':
                this.builder.switch(this.operand(stmt.key),
                    stmt.cases.map((c): [Value, BasicBlock] => [this.operand(c.value), this.builder.getBlock(c.target)]), this.builder.getBlock(stmt.default));
                break;
            case 'return':
                this.builder.ret(stmt.value === undefined ? undefined : this.operand(stmt.value));
                break;
            case 'unreachable':
                this.builder.unreachable();
                break;
        }
    }

    private assign(def: string | undefined, rightOp: AbstractExpr): void {
        const local = def === undefined ? this.builder.newLocal() : this.def(def);
        this.builder.assign(local, rightOp);
        local.setType(rightOp.getType());
    }

    private def(key: string): Local {
        const local = this.locals.get(key);
        if (!local) {
            throw new Error(`Value ${key} has not been declared.`);
        }
        return local;
    }

    private requireDef(key: string | undefined, op: string): Local {
        if (key === undefined) {
            throw new Error(`A ${op} statement needs a def.`);
        }
        return this.def(key);
    }

    private operand(json: OperandJson): Value {
        if (json === null) {
            return NullConstant.getInstance();
        }
        if (typeof json !== 'string') {
            if ('int' in json) {
                return new IntConstant(BigInt(json.int), json.bits);
            }
            return new FloatConstant(json.float, json.bits);
        }
        if (json.startsWith('$')) {
            return this.builder.getParam(Number(json.slice(1)));
        }
        const key = json.startsWith('%') ? json.slice(1) : json;
        const local = this.locals.get(key);
        if (local) {
            return local;
        }
        if (json.startsWith('%')) {
            return this.builder.getParam(key);
        }
        throw new Error(`Unknown value ${json}.`);
    }
}

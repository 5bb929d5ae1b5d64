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

import { describe, expect, it } from 'vitest';
import { IntConstant } from '../../src/core/base/Constant';
import { BinaryOperator, BinopExpr, InvokeExpr } from '../../src/core/base/Expr';
import { InvokeStmt } from '../../src/core/base/Stmt';
import { Value } from '../../src/core/base/Value';
import { LiveValues } from '../../src/core/dataflow/LiveValues';
import { RoutineBuilder } from '../../src/core/model/builder/RoutineBuilder';
import { externalRoutine, i32 } from './fixtures';

function names(values: Set<Value>): string[] {
    return [...values].map(value => value.toString()).sort();
}

describe('LiveValues', () => {
    it('computes the values live after each statement of straight-line code', () => {
        const builder = new RoutineBuilder('straight', [{ name: 'a', type: i32 }, { name: 'b', type: i32 }]);
        const entry = builder.addBlock('entry');
        builder.setInsertPoint(entry);
        const x = builder.assign('x', new BinopExpr(BinaryOperator.ADD, builder.getParam('a'), builder.getParam('b')));
        const call = builder.call(externalRoutine(), []);
        const y = builder.assign('y', new BinopExpr(BinaryOperator.MUL, x, builder.getParam('a')));
        builder.ret(y);
        const cfg = builder.build().getCfg() ?? fail();

        const liveness = new LiveValues(cfg);
        expect(names(liveness.getLiveIn(entry))).toEqual(['%a', '%b']);
        expect(names(liveness.getLiveOut(entry))).toEqual([]);
        expect(names(liveness.liveValuesAfter(call))).toEqual(['%a', '%x']);
        expect(names(liveness.liveValuesAfter(y.getDeclaringStmt() ?? fail()))).toEqual(['%y']);
    });

    it('keeps phi arguments live only on their incoming edge', () => {
        const builder = new RoutineBuilder('loop', [{ name: 'n', type: i32 }]);
        const entry = builder.addBlock('entry');
        const header = builder.addBlock('header');
        const body = builder.addBlock('body');
        const exit = builder.addBlock('exit');
        const next = builder.newLocal('next', i32);

        builder.setInsertPoint(entry);
        builder.goto(header);
        builder.setInsertPoint(header);
        const i = builder.phi('i', i32, [[new IntConstant(0, 32), entry], [next, body]]);
        const done = builder.assign('done', new BinopExpr(BinaryOperator.GE, i, builder.getParam('n')));
        builder.branch(done, exit, body);
        builder.setInsertPoint(body);
        builder.assign(next, new BinopExpr(BinaryOperator.ADD, i, new IntConstant(1, 32)));
        builder.goto(header);
        builder.setInsertPoint(exit);
        builder.ret(i);
        const cfg = builder.build().getCfg() ?? fail();

        const liveness = new LiveValues(cfg);
        expect(names(liveness.getLiveIn(entry))).toEqual(['%n']);
        expect(names(liveness.getLiveIn(header))).toEqual(['%n']);
        expect(names(liveness.getLiveOut(header))).toEqual(['%i', '%n']);
        expect(names(liveness.getLiveIn(body))).toEqual(['%i', '%n']);
        expect(names(liveness.getLiveOut(body))).toEqual(['%n', '%next']);
        expect(names(liveness.liveValuesAfter(done.getDeclaringStmt() ?? fail()))).toEqual(['%done', '%i', '%n']);
    });

    it('sees statements inserted after it was built', () => {
        const builder = new RoutineBuilder('late', [{ name: 'a', type: i32 }]);
        builder.setInsertPoint(builder.addBlock('entry'));
        const call = builder.call(externalRoutine(), []);
        const ret = builder.ret();
        const cfg = builder.build().getCfg() ?? fail();
        const liveness = new LiveValues(cfg);
        expect(names(liveness.liveValuesAfter(call))).toEqual([]);

        cfg.insertBefore(new InvokeStmt(new InvokeExpr(externalRoutine('use'), [builder.getParam('a')])), ret);
        expect(names(liveness.liveValuesAfter(call))).toEqual(['%a']);
    });
});

function fail(): never {
    throw new Error('unexpected missing value');
}

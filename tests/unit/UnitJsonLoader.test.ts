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

import path from 'path';
import { describe, expect, it } from 'vitest';
import { IntType, StructType } from '../../src/core/base/Type';
import { parseType, UnitJsonLoader } from '../../src/core/model/builder/UnitJsonLoader';

const COUNT_UNIT = path.join(__dirname, '../fixtures/count.json');

function routineJson(stmts: object[], params: object[] = []): object {
    return { name: 'bad', routines: [{ name: 'f', params: params, blocks: [{ label: 'entry', stmts: stmts }] }] };
}

describe('parseType', () => {
    it('parses scalar and aggregate types', () => {
        expect(parseType('i32')).toBe(IntType.getInstance(32));
        expect(parseType('f64').toString()).toBe('f64');
        expect(parseType('void').toString()).toBe('void');
        expect(parseType(' ptr ').toString()).toBe('ptr');
        expect(parseType('i8*').toString()).toBe('i8*');
        expect(parseType('[4 x i32]').toString()).toBe('[4 x i32]');
        expect(parseType('<2 x f32>').toString()).toBe('<2 x f32>');
    });

    it('shares struct types by name', () => {
        const structs = new Map<string, StructType>();
        const node = parseType('%struct.node', structs);
        expect(parseType('%struct.node*', structs).toString()).toBe('%struct.node*');
        expect(structs.get('struct.node')).toBe(node);
    });

    it('rejects unknown types', () => {
        expect(() => parseType('bogus')).toThrow('Unknown type bogus.');
    });
});

describe('UnitJsonLoader', () => {
    it('loads a unit from a file', () => {
        const unit = new UnitJsonLoader().loadFile(COUNT_UNIT);
        expect(unit.getName()).toBe('demo');
        expect(unit.getDeclaration('work')?.toString()).toBe('void @work()');

        const routine = unit.getRoutine('count');
        expect(routine?.getSignature().toString()).toBe('i32 @count(i32)');
        const cfg = routine?.getCfg();
        expect([...(cfg?.getBlocks() ?? [])].map(block => block.getLabel())).toEqual(['entry', 'header', 'body', 'exit']);
        expect(cfg?.getStmts().map(stmt => stmt.toString())).toEqual([
            'goto',
            '%i = phi i32 [i32 0, entry], [%next, body]',
            '%done = ge %i, %n',
            'if %done',
            'call void @work()',
            '%next = add %i, i32 1',
            'goto',
            'return %i',
        ]);
        expect(routine?.getBody()?.getLocal('i')?.getType()).toBe(IntType.getInstance(32));
    });

    it('resolves unnamed values and parameters by position', () => {
        const unit = new UnitJsonLoader().load(routineJson([
            { op: 'binop', def: '#t', operator: 'add', lhs: '$0', rhs: { int: 1, bits: 32 } },
            { op: 'return', value: '#t' },
        ], [{ type: 'i32' }]));
        const stmts = unit.getRoutine('f')?.getCfg()?.getStmts() ?? [];
        expect(stmts.map(stmt => stmt.toString())).toEqual(['%<unnamed> = add %<arg0>, i32 1', 'return %<unnamed>']);
    });

    it('reports schema violations with their path', () => {
        expect(() => new UnitJsonLoader().load(routineJson([])))
            .toThrow('Invalid unit: routines.0.blocks.0.stmts: Array must contain at least 1 element(s)');
    });

    it('rejects text which is not JSON', () => {
        expect(() => new UnitJsonLoader().loadText('{ name')).toThrow(/^Invalid unit: /);
    });

    it('rejects unresolved references', () => {
        const loader = new UnitJsonLoader();
        expect(() => loader.load(routineJson([{ op: 'call', callee: 'missing' }, { op: 'return' }])))
            .toThrow('Unknown callee missing.');
        expect(() => loader.load(routineJson([{ op: 'return', value: '#nope' }])))
            .toThrow('Unknown value #nope.');
    });

    it('rejects values defined twice', () => {
        const one = { int: 1, bits: 32 };
        expect(() => new UnitJsonLoader().load(routineJson([
            { op: 'binop', def: 'x', operator: 'add', lhs: one, rhs: one },
            { op: 'binop', def: 'x', operator: 'add', lhs: one, rhs: one },
            { op: 'return' },
        ]))).toThrow('Value x is defined twice in routine f.');
    });
});

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

import { IntType, VoidType } from '../../src/core/base/Type';
import { Stmt } from '../../src/core/base/Stmt';
import { BasicBlock } from '../../src/core/graph/BasicBlock';
import { Routine } from '../../src/core/model/Routine';
import { RoutineSignature } from '../../src/core/model/RoutineSignature';
import { RoutineBuilder } from '../../src/core/model/builder/RoutineBuilder';

export const i1 = IntType.getInstance(1);
export const i32 = IntType.getInstance(32);

export function externalRoutine(name: string = 'work'): RoutineSignature {
    return new RoutineSignature(name, [], VoidType.getInstance());
}

export interface NestedLoops {
    routine: Routine;
    blocks: Record<'E' | 'H' | 'I' | 'M' | 'L' | 'X', BasicBlock>;
    call: Stmt;
}

/**
 * E -> H; H -> I | L; I -> I | M; M: call, -> L; L -> H | X.
 * The outer loop at H holds M and L, the inner loop is the self loop on I.
 */
export function buildNestedLoops(callee: RoutineSignature = externalRoutine()): NestedLoops {
    const builder = new RoutineBuilder('nested', [{ name: 'c', type: i1 }]);
    const c = builder.getParam('c');
    const E = builder.addBlock('E');
    const H = builder.addBlock('H');
    const I = builder.addBlock('I');
    const M = builder.addBlock('M');
    const L = builder.addBlock('L');
    const X = builder.addBlock('X');

    builder.setInsertPoint(E);
    builder.goto(H);
    builder.setInsertPoint(H);
    builder.branch(c, I, L);
    builder.setInsertPoint(I);
    builder.branch(c, I, M);
    builder.setInsertPoint(M);
    const call = builder.call(callee, []);
    builder.goto(L);
    builder.setInsertPoint(L);
    builder.branch(c, H, X);
    builder.setInsertPoint(X);
    builder.ret();

    return { routine: builder.build(), blocks: { E, H, I, M, L, X }, call };
}

/**
 * A self loop on P followed by an irreducible loop at H: A and B jump into each other, both
 * reachable from H. With a callee, E calls it before entering P.
 */
export function buildIrreducible(callee?: RoutineSignature): { routine: Routine; P: BasicBlock; H: BasicBlock } {
    const builder = new RoutineBuilder('irreducible', [{ name: 'c', type: i1 }]);
    const c = builder.getParam('c');
    const E = builder.addBlock('E');
    const P = builder.addBlock('P');
    const H = builder.addBlock('H');
    const A = builder.addBlock('A');
    const B = builder.addBlock('B');
    const L = builder.addBlock('L');
    const X = builder.addBlock('X');

    builder.setInsertPoint(E);
    if (callee) {
        builder.call(callee, []);
    }
    builder.goto(P);
    builder.setInsertPoint(P);
    builder.branch(c, P, H);
    builder.setInsertPoint(H);
    builder.branch(c, A, B);
    builder.setInsertPoint(A);
    builder.branch(c, B, L);
    builder.setInsertPoint(B);
    builder.goto(A);
    builder.setInsertPoint(L);
    builder.branch(c, H, X);
    builder.setInsertPoint(X);
    builder.ret();

    return { routine: builder.build(), P, H };
}

/**
 * Builds routine `name(i1 %c)` from a successor list. Blocks are laid out in the order given
 * and end in a return, a goto or a branch on `%c` depending on their number of successors.
 * Blocks named in `calls` call `work` first.
 */
export function buildGraph(name: string, succs: [string, string[]][], calls: string[] = []): { routine: Routine; blocks: Map<string, BasicBlock> } {
    const builder = new RoutineBuilder(name, [{ name: 'c', type: i1 }]);
    const c = builder.getParam('c');
    const work = externalRoutine();
    const blocks = new Map<string, BasicBlock>();
    for (const [label] of succs) {
        blocks.set(label, builder.addBlock(label));
    }
    for (const [label, targets] of succs) {
        builder.setInsertPoint(builder.getBlock(label));
        if (calls.includes(label)) {
            builder.call(work, []);
        }
        const [first, second] = targets.map(target => builder.getBlock(target));
        if (targets.length > 2) {
            throw new Error(`Block ${label} has more than two successors.`);
        } else if (second) {
            builder.branch(c, first, second);
        } else if (first) {
            builder.goto(first);
        } else {
            builder.ret();
        }
    }
    return { routine: builder.build(), blocks };
}

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
import { InvokeExpr } from '../../src/core/base/Expr';
import { InvokeStmt } from '../../src/core/base/Stmt';
import { AnalysisErrorCode } from '../../src/core/common/AnalysisError';
import { StmtSetClassifier } from '../../src/core/common/EquivalencePoint';
import { BasicBlock } from '../../src/core/graph/BasicBlock';
import { Loop } from '../../src/core/graph/Loop';
import { LoopInfo } from '../../src/core/graph/LoopInfo';
import { LoopPathFinder } from '../../src/core/graph/LoopPathFinder';
import { RoutineBuilder } from '../../src/core/model/builder/RoutineBuilder';
import { buildGraph, buildIrreducible, buildNestedLoops, externalRoutine, i1 } from './fixtures';

function labels(blocks: { getBlock(): { getLabel(): string }; isSubLoopExit(): boolean }[]): string[] {
    return blocks.map(node => node.getBlock().getLabel() + (node.isSubLoopExit() ? '*' : ''));
}

describe('LoopPathFinder', () => {
    it('enumerates the paths of nested loops innermost first', () => {
        const { routine, blocks, call } = buildNestedLoops();
        const finder = new LoopPathFinder({ classifier: new StmtSetClassifier([call]) });

        const result = finder.runOnRoutine(routine);
        expect(result.errCode).toBe(AnalysisErrorCode.OK);
        expect(finder.analysisFailed()).toBe(false);

        const [outer, inner] = finder.getLoopInfo().getLoops();
        expect(outer.getHeader()).toBe(blocks.H);
        expect(inner.getHeader()).toBe(blocks.I);

        const innerPaths = finder.getPaths(inner);
        expect(innerPaths).toHaveLength(1);
        expect(innerPaths[0].isSpanningPath()).toBe(true);
        expect(labels(innerPaths[0].getNodes())).toEqual(['I']);

        const paths = finder.getPaths(outer);
        expect(paths.map(path => labels(path.getNodes()))).toEqual([['H', 'I*', 'M'], ['H', 'L'], ['M', 'L']]);

        expect(paths[0].getStart()).toBe(blocks.H.getHead());
        expect(paths[0].getEnd()).toBe(call);
        expect(paths[0].isStartsAtHeader()).toBe(true);
        expect(paths[0].isEqPointPath()).toBe(true);

        expect(paths[1].isSpanningPath()).toBe(true);

        expect(paths[2].getStart()).toBe(blocks.M.getTerminator());
        expect(paths[2].getEnd()).toBe(blocks.L.getTerminator());
        expect(paths[2].isStartsAtHeader()).toBe(false);
        expect(paths[2].isEndsAtBackedge()).toBe(true);

        expect(finder.getEqPointPaths(outer)).toEqual([paths[0]]);
        expect(finder.getSpanningPaths(outer)).toEqual([paths[1]]);
        expect(finder.getBackedgePaths(outer)).toEqual([paths[1], paths[2]]);
    });

    it('summarizes which blocks lie on spanning and equivalence point paths', () => {
        const { routine, blocks, call } = buildNestedLoops();
        const finder = new LoopPathFinder({ classifier: new StmtSetClassifier([call]) });
        finder.runOnRoutine(routine);
        const [outer, inner] = finder.getLoopInfo().getLoops();

        const summary = finder.getSummary(outer);
        expect([...summary.hasSpanningPath.entries()].map(([block, flag]) => [block.getLabel(), flag]))
            .toEqual([['H', true], ['M', false], ['L', true]]);
        expect([...summary.hasEqPointPath.entries()].map(([block, flag]) => [block.getLabel(), flag]))
            .toEqual([['H', true], ['M', true], ['L', true]]);

        expect(finder.spanningPathThroughBlock(inner, blocks.I)).toBe(true);
        expect(finder.eqPointPathThroughBlock(inner, blocks.I)).toBe(false);
        // blocks of a sub-loop have no entry in the parent's summary
        expect(finder.spanningPathThroughBlock(outer, blocks.I)).toBe(false);
        expect(finder.getPathsThroughBlock(outer, blocks.M)).toHaveLength(2);
        expect(finder.getPathsThroughBlock(outer, blocks.I)).toHaveLength(1);
    });

    it('marks every block of every path in the summary', () => {
        const { routine } = buildNestedLoops();
        const finder = new LoopPathFinder();
        finder.runOnRoutine(routine);

        for (const loop of finder.getLoopInfo().getLoops()) {
            const subLoopBlocks = new Set(finder.getLoopInfo().getChildren(loop).flatMap(child => [...child.getBlocks()]));
            for (const path of finder.getPaths(loop)) {
                for (const block of path.getBlocks()) {
                    if (subLoopBlocks.has(block)) {
                        continue;
                    }
                    if (path.isSpanningPath()) {
                        expect(finder.spanningPathThroughBlock(loop, block)).toBe(true);
                    } else {
                        expect(finder.eqPointPathThroughBlock(loop, block)).toBe(true);
                    }
                }
            }
        }
    });

    it('stops at the end of the block entering a sub-loop which holds a migration point', () => {
        const builder = new RoutineBuilder('inner-call', [{ name: 'c', type: i1 }]);
        const c = builder.getParam('c');
        const E = builder.addBlock('E');
        const H = builder.addBlock('H');
        const I = builder.addBlock('I');
        const L = builder.addBlock('L');
        const X = builder.addBlock('X');
        builder.setInsertPoint(E);
        builder.goto(H);
        builder.setInsertPoint(H);
        builder.goto(I);
        builder.setInsertPoint(I);
        const call = builder.call(externalRoutine(), []);
        builder.branch(c, I, L);
        builder.setInsertPoint(L);
        builder.branch(c, H, X);
        builder.setInsertPoint(X);
        builder.ret();

        const finder = new LoopPathFinder();
        expect(finder.runOnRoutine(builder.build()).errCode).toBe(AnalysisErrorCode.OK);
        const [outer, inner] = finder.getLoopInfo().getLoops();

        const innerPaths = finder.getPaths(inner);
        expect(innerPaths).toHaveLength(2);
        expect(innerPaths[0].getEnd()).toBe(call);
        expect(innerPaths[0].isEqPointPath()).toBe(true);
        expect(innerPaths[1].getStart()).toBe(I.getTerminator());
        expect(innerPaths[1].isEndsAtBackedge()).toBe(true);
        expect(innerPaths[1].isSpanningPath()).toBe(false);

        const paths = finder.getPaths(outer);
        expect(paths.map(path => labels(path.getNodes()))).toEqual([['H'], ['I*', 'L']]);
        expect(paths[0].getStart()).toBe(H.getTerminator());
        expect(paths[0].getEnd()).toBe(H.getTerminator());
        expect(paths[0].isEqPointPath()).toBe(true);
        expect(paths[1].getStart()).toBe(I.getTerminator());
        expect(paths[1].isStartsAtHeader()).toBe(false);
        expect(paths[1].isEndsAtBackedge()).toBe(true);
        expect(finder.getSpanningPaths(outer)).toHaveLength(0);
        expect(finder.spanningPathThroughBlock(outer, L)).toBe(false);
        expect(finder.eqPointPathThroughBlock(outer, L)).toBe(true);
    });

    it('discards the results of every loop when a cycle is found', () => {
        const { routine, P, H } = buildIrreducible();
        const finder = new LoopPathFinder();

        const result = finder.runOnRoutine(routine);
        expect(result.errCode).toBe(AnalysisErrorCode.LOOP_PATHS_CYCLE_DETECTED);
        expect(result.errMsg).toBe('detected a cycle in irreducible, bailing on analysis');
        expect(finder.analysisFailed()).toBe(true);

        const loopInfo = finder.getLoopInfo();
        expect(loopInfo.getLoops().map(loop => loop.getHeader())).toEqual([P, H]);
        for (const loop of loopInfo.getLoops()) {
            expect(finder.hasPaths(loop)).toBe(false);
            expect(() => finder.getPaths(loop)).toThrow(`No paths for ${loop.toString()}.`);
        }
    });

    it('gives up once a loop has more paths than the ceiling', () => {
        const { routine } = buildNestedLoops();
        const finder = new LoopPathFinder({ maxNumPaths: 2 });

        const result = finder.runOnRoutine(routine);
        expect(result.errCode).toBe(AnalysisErrorCode.LOOP_PATHS_TOO_MANY);
        expect(result.errMsg).toBe('too many paths in nested, bailing on analysis');
        for (const loop of finder.getLoopInfo().getLoops()) {
            expect(finder.hasPaths(loop)).toBe(false);
        }

        const enough = new LoopPathFinder({ maxNumPaths: 3 });
        expect(enough.runOnRoutine(routine).errCode).toBe(AnalysisErrorCode.OK);
        expect(enough.getMaxNumPaths()).toBe(3);
    });

    it('counts paths ending at migration points against the ceiling', () => {
        const calls = ['B0', 'B1', 'B2', 'B3', 'B4'];
        const { routine } = buildGraph('chain', [
            ['E', ['B0']], ['B0', ['B1']], ['B1', ['B2']], ['B2', ['B3']], ['B3', ['B4']], ['B4', ['L']], ['L', ['B0', 'X']], ['X', []],
        ], calls);

        expect(new LoopPathFinder({ maxNumPaths: 5 }).runOnRoutine(routine).errCode).toBe(AnalysisErrorCode.LOOP_PATHS_TOO_MANY);

        const finder = new LoopPathFinder({ maxNumPaths: 6 });
        expect(finder.runOnRoutine(routine).errCode).toBe(AnalysisErrorCode.OK);
        const [loop] = finder.getLoopInfo().getLoops();
        expect(finder.getPaths(loop).map(path => labels(path.getNodes()))).toEqual([
            ['B0'], ['B0', 'B1'], ['B1', 'B2'], ['B2', 'B3'], ['B3', 'B4'], ['B4', 'L'],
        ]);
        expect(finder.getEqPointPaths(loop).filter(path => !path.isEndsAtBackedge())).toHaveLength(5);
    });

    it('hands out copies of its summaries', () => {
        const { routine, blocks } = buildNestedLoops();
        const finder = new LoopPathFinder();
        finder.runOnRoutine(routine);
        const [outer, inner] = finder.getLoopInfo().getLoops();
        expect(finder.getPaths(outer)).toHaveLength(3);

        const flags = finder.getSummary(inner).hasSpanningPath;
        if (flags instanceof Map) {
            flags.clear();
        }
        expect(finder.getSummary(inner)).not.toBe(finder.getSummary(inner));
        expect(finder.spanningPathThroughBlock(inner, blocks.I)).toBe(true);

        expect(finder.rerunOnLoop(outer).errCode).toBe(AnalysisErrorCode.OK);
        expect(finder.getPaths(outer)).toHaveLength(3);
    });

    it('rejects queries which have no results', () => {
        const { routine, blocks } = buildNestedLoops();
        const finder = new LoopPathFinder();
        expect(() => finder.getLoopInfo()).toThrow('No routine has been analyzed.');

        const loopInfo = new LoopInfo(routine.getCfg() ?? fail());
        const [outer, inner] = loopInfo.getLoops();
        expect(finder.hasPaths(outer)).toBe(false);
        expect(() => finder.getSummary(outer)).toThrow(`No paths for ${outer.toString()}.`);

        finder.runOnRoutine(routine, loopInfo);
        expect(() => finder.spanningPathThroughBlock(inner, blocks.H)).toThrow(`${inner.toString()} does not contain block H.`);
        expect(() => finder.getPathsThroughBlock(inner, blocks.M)).toThrow(`${inner.toString()} does not contain block M.`);
    });

    it('refuses to analyze a loop before its sub-loops', () => {
        const { routine } = buildNestedLoops();
        const finder = new LoopPathFinder({ maxNumPaths: 2 });
        finder.runOnRoutine(routine);
        const [outer, inner] = finder.getLoopInfo().getLoops();

        expect(() => finder.rerunOnLoop(outer)).toThrow(`Sub-loop ${inner.toString()} must be analyzed before ${outer.toString()}.`);
    });

    it('recomputes one loop after a migration point was added to it', () => {
        const callee = externalRoutine();
        const { routine, blocks } = buildNestedLoops(callee);
        const classifier = new StmtSetClassifier();
        const finder = new LoopPathFinder({ classifier: classifier });
        finder.runOnRoutine(routine);
        const inner = finder.getLoopInfo().getLoops()[1];

        const cfg = routine.getCfg() ?? fail();
        const term = blocks.I.getTerminator() ?? fail();
        const newCall = new InvokeStmt(new InvokeExpr(callee, []));
        cfg.insertBefore(newCall, term);
        classifier.add(newCall);

        expect(finder.rerunOnLoop(inner).errCode).toBe(AnalysisErrorCode.OK);
        const paths = finder.getPaths(inner);
        expect(paths).toHaveLength(2);
        expect(paths[0].getStart()).toBe(newCall);
        expect(paths[0].getEnd()).toBe(newCall);
        expect(paths[1].getStart()).toBe(term);
        expect(paths[1].isEndsAtBackedge()).toBe(true);
        expect(finder.spanningPathThroughBlock(inner, blocks.I)).toBe(false);
        expect(finder.eqPointPathThroughBlock(inner, blocks.I)).toBe(true);
    });
});

interface WalkNode {
    block: BasicBlock;
    mode: 'top' | 'after' | 'exit';
}

interface ExpectedPaths {
    paths: Set<string>;
    spanning: Map<BasicBlock, boolean>;
    eqPoint: Map<BasicBlock, boolean>;
}

function pathKey(nodes: string[], startsAtHeader: boolean, endsAtBackedge: boolean): string {
    return `${startsAtHeader ? 'header' : 'point'} [${nodes.join(', ')}] ${endsAtBackedge ? 'backedge' : 'point'}`;
}

function byLabel(flags: ReadonlyMap<BasicBlock, boolean>): Record<string, boolean> {
    return Object.fromEntries([...flags].map(([block, flag]) => [block.getLabel(), flag]));
}

/**
 * Walks every simple path of `loop` block by block. Sub-loops are crossed through their
 * exiting blocks, using the results already computed for them.
 */
function walkLoop(loopInfo: LoopInfo, loop: Loop, subLoopResults: Map<Loop, ExpectedPaths>): ExpectedPaths {
    const result: ExpectedPaths = { paths: new Set(), spanning: new Map(), eqPoint: new Map() };
    for (const block of loop.getBlocks()) {
        if (!loopInfo.getChildContaining(loop, block)) {
            result.spanning.set(block, false);
            result.eqPoint.set(block, false);
        }
    }
    const hasCall = (block: BasicBlock): boolean => block.getStmts().some(stmt => stmt.containsInvokeExpr());
    const starts: WalkNode[] = [];

    const emit = (nodes: WalkNode[], startsAtHeader: boolean, endsAtBackedge: boolean): void => {
        result.paths.add(pathKey(nodes.map(node => node.block.getLabel() + (node.mode === 'exit' ? '*' : '')), startsAtHeader, endsAtBackedge));
        const flags = startsAtHeader && endsAtBackedge ? result.spanning : result.eqPoint;
        nodes.filter(node => node.mode !== 'exit').forEach(node => flags.set(node.block, true));
    };

    const walk = (prefix: WalkNode[], node: WalkNode, startsAtHeader: boolean): void => {
        if (prefix.some(other => other.block === node.block)) {
            throw new Error(`Cycle through ${node.block.getLabel()}.`);
        }
        const nodes = [...prefix, node];
        if (node.mode === 'top' && hasCall(node.block)) {
            emit(nodes, startsAtHeader, false);
            starts.push({ block: node.block, mode: 'after' });
            return;
        }
        if (loop.isLatch(node.block)) {
            emit(nodes, startsAtHeader, true);
            return;
        }
        const own = node.mode === 'exit' ? loopInfo.getChildContaining(loop, node.block) : undefined;
        for (const succ of node.block.getSuccessors()) {
            if (!loop.contains(succ) || succ === loop.getHeader() || own?.contains(succ)) {
                continue;
            }
            const child = loopInfo.getChildContaining(loop, succ);
            if (!child) {
                walk(nodes, { block: succ, mode: 'top' }, startsAtHeader);
                continue;
            }
            const childResult = subLoopResults.get(child) ?? fail();
            for (const exiting of child.getExitingBlocks()) {
                if (childResult.eqPoint.get(exiting)) {
                    emit(nodes, startsAtHeader, false);
                    starts.push({ block: exiting, mode: 'exit' });
                }
                if (childResult.spanning.get(exiting)) {
                    walk(nodes, { block: exiting, mode: 'exit' }, startsAtHeader);
                }
            }
        }
    };

    walk([], { block: loop.getHeader(), mode: 'top' }, true);
    const seen = new Set<string>();
    for (let start = starts.shift(); start !== undefined; start = starts.shift()) {
        const key = `${start.block.getLabel()}:${start.mode}`;
        if (!seen.has(key)) {
            seen.add(key);
            walk([], start, false);
        }
    }
    return result;
}

const SMALL_GRAPHS: { name: string; succs: [string, string[]][]; calls: string[] }[] = [
    {
        name: 'diamond',
        succs: [['E', ['H']], ['H', ['A', 'B']], ['A', ['C']], ['B', ['C']], ['C', ['H', 'X']], ['X', []]],
        calls: ['A'],
    },
    {
        name: 'twoLatches',
        succs: [['E', ['H']], ['H', ['A', 'B']], ['A', ['H', 'C']], ['B', ['C']], ['C', ['H', 'X']], ['X', []]],
        calls: ['B', 'C'],
    },
    {
        name: 'innerCall',
        succs: [['E', ['H']], ['H', ['I', 'L']], ['I', ['J']], ['J', ['I', 'M']], ['M', ['L']], ['L', ['H', 'X']], ['X', []]],
        calls: ['J'],
    },
    {
        name: 'twoInnerExits',
        succs: [['E', ['H']], ['H', ['I']], ['I', ['J', 'L']], ['J', ['I', 'M']], ['M', ['L']], ['L', ['H', 'X']], ['X', []]],
        calls: ['I', 'M'],
    },
    {
        name: 'innerExitsToLatch',
        succs: [['E', ['H']], ['H', ['I']], ['I', ['I', 'L']], ['L', ['H', 'X']], ['X', []]],
        calls: ['I'],
    },
    {
        name: 'nested',
        succs: [['E', ['H']], ['H', ['I', 'L']], ['I', ['I', 'M']], ['M', ['L']], ['L', ['H', 'X']], ['X', []]],
        calls: ['H', 'M'],
    },
    {
        name: 'tripleNest',
        succs: [['E', ['A']], ['A', ['B']], ['B', ['C']], ['C', ['C', 'D']], ['D', ['B', 'F']], ['F', ['A', 'X']], ['X', []]],
        calls: ['C', 'F'],
    },
];

describe('LoopPathFinder on small graphs', () => {
    it.each(SMALL_GRAPHS)('finds the paths of a block-by-block walk on $name', ({ name, succs, calls }) => {
        const { routine } = buildGraph(name, succs, calls);
        const finder = new LoopPathFinder();
        expect(finder.runOnRoutine(routine).errCode).toBe(AnalysisErrorCode.OK);

        const loopInfo = finder.getLoopInfo();
        const expected = new Map<Loop, ExpectedPaths>();
        for (const loop of loopInfo.getTopLevelLoops().flatMap(top => loopInfo.getLoopNest(top))) {
            expected.set(loop, walkLoop(loopInfo, loop, expected));
        }
        expect(expected.size).toBe(loopInfo.getLoops().length);

        for (const [loop, want] of expected) {
            expect(want.paths.size).toBeGreaterThan(0);
            const found = new Set(finder.getPaths(loop).map(path => pathKey(labels(path.getNodes()), path.isStartsAtHeader(), path.isEndsAtBackedge())));
            expect(found).toEqual(want.paths);
            const summary = finder.getSummary(loop);
            expect(byLabel(summary.hasSpanningPath)).toEqual(byLabel(want.spanning));
            expect(byLabel(summary.hasEqPointPath)).toEqual(byLabel(want.eqPoint));
        }
    });
});

function fail(): never {
    throw new Error('unexpected missing value');
}

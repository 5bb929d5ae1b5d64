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
import { DEFAULT_MAX_NUM_PATHS } from '../common/Const';
import { CallSiteClassifier, MigrationPointClassifier } from '../common/EquivalencePoint';
import { Routine } from '../model/Routine';
import { BasicBlock } from './BasicBlock';
import { Cfg } from './Cfg';
import { Loop } from './Loop';
import { LoopInfo } from './LoopInfo';
import { LoopPath, PathNode } from './LoopPath';
import Logger, { LOG_MODULE_TYPE } from '../../utils/logger';
const logger = Logger.getLogger(LOG_MODULE_TYPE.MIGRATION_ANALYZER, 'LoopPathFinder');

/**
 * Per-block facts about one loop, the only thing an enclosing loop reads about it.
 * - hasSpanningPath: some header-to-backedge path passes through the block.
 * - hasEqPointPath: some path ending at a migration point, or starting at one and ending
 *   at a backedge, passes through the block.
 */
export interface LoopSummary {
    readonly hasSpanningPath: ReadonlyMap<BasicBlock, boolean>;
    readonly hasEqPointPath: ReadonlyMap<BasicBlock, boolean>;
}

// written only while its loop is analyzed
interface SummaryFlags {
    hasSpanningPath: Map<BasicBlock, boolean>;
    hasEqPointPath: Map<BasicBlock, boolean>;
}

export interface LoopPathFinderOptions {
    maxNumPaths?: number;
    classifier?: MigrationPointClassifier;
}

enum StepKind {
    VISIT,
    QUEUE,
    SUB_LOOP_EQ_EXIT,
}

interface DfsStep {
    kind: StepKind;
    stmt: Stmt;
}

interface DfsFrame {
    block: BasicBlock;
    steps: DfsStep[];
    next: number;
}

/**
 * Enumerates, for every loop of a routine, the acyclic paths of the following forms:
 *
 * - header to backedge block, with no migration point on the path
 * - header to a migration point
 * - migration point to migration point
 * - migration point to backedge block
 *
 * Nested loops are crossed as opaque units through the summaries computed for them, so loops
 * are analyzed children first. A cycle inside a loop body (irreducible control flow) or more
 * than `maxNumPaths` paths in one loop discards the results of every loop in the routine.
 *
 * @category core/graph
 * @example
 * 1. list the backedge paths of every loop.

```typescript
const finder = new LoopPathFinder({ maxNumPaths: 1000 });
const result = finder.runOnRoutine(routine);
if (result.errCode === AnalysisErrorCode.OK) {
    for (const loop of finder.getLoopInfo().getLoops()) {
        for (const path of finder.getBackedgePaths(loop)) {
            ...
        }
    }
}
```
 */
export class LoopPathFinder {
    private maxNumPaths: number;
    private classifier: MigrationPointClassifier;

    private cfg?: Cfg;
    private loopInfo?: LoopInfo;
    private paths: Map<number, LoopPath[]> = new Map();
    private summaries: Map<number, SummaryFlags> = new Map();
    private tooManyPaths: boolean = false;
    private detectedCycle: boolean = false;

    // state of the loop being analyzed
    private curLoop?: Loop;
    private subLoopBlocks: Set<BasicBlock> = new Set();

    constructor(options: LoopPathFinderOptions = {}) {
        this.maxNumPaths = options.maxNumPaths ?? DEFAULT_MAX_NUM_PATHS;
        this.classifier = options.classifier ?? new CallSiteClassifier();
    }

    public getMaxNumPaths(): number {
        return this.maxNumPaths;
    }

    public getLoopInfo(): LoopInfo {
        if (!this.loopInfo) {
            throw new Error('No routine has been analyzed.');
        }
        return this.loopInfo;
    }

    /**
     * Analyzes every loop of the routine, nest by nest and innermost loops first.
     * @param loopInfo - the loop forest of the routine, built from its CFG when omitted.
     */
    public runOnRoutine(routine: Routine, loopInfo?: LoopInfo): AnalysisError {
        const cfg = routine.getCfg();
        if (!cfg) {
            throw new Error(`Routine ${routine.getName()} has no body.`);
        }
        logger.debug(`enumerate loop paths of routine ${routine.getName()}`);

        this.reset();
        this.tooManyPaths = false;
        this.detectedCycle = false;
        this.cfg = cfg;
        this.loopInfo = loopInfo ?? new LoopInfo(cfg);

        for (const top of this.loopInfo.getTopLevelLoops()) {
            const nest = this.loopInfo.getLoopNest(top);
            logger.debug(`analyzing nest with ${nest.length} loops`);
            for (const loop of nest) {
                if (!this.analyzeLoop(loop)) {
                    break;
                }
            }
            if (this.analysisFailed()) {
                break;
            }
        }

        return this.finish(routine.getName());
    }

    /**
     * Recomputes the paths and the summary of one loop, for instance after the code inside it
     * has changed. Children of the loop must still have results.
     */
    public rerunOnLoop(loop: Loop): AnalysisError {
        this.getLoopInfo();
        if (!this.paths.has(loop.getId())) {
            logger.debug(`no previous analysis for ${loop.toString()}`);
        }
        this.tooManyPaths = false;
        this.detectedCycle = false;
        this.analyzeLoop(loop);
        return this.finish(loop.toString());
    }

    /** Returns true if the last analysis aborted, in which case no loop has results. */
    public analysisFailed(): boolean {
        return this.tooManyPaths || this.detectedCycle;
    }

    public hasPaths(loop: Loop): boolean {
        return this.loopInfo !== undefined && this.loopInfo.getLoops()[loop.getId()] === loop && this.paths.has(loop.getId());
    }

    public getPaths(loop: Loop): LoopPath[] {
        return [...this.getLoopPaths(loop)];
    }

    public getBackedgePaths(loop: Loop): LoopPath[] {
        return this.getLoopPaths(loop).filter(path => path.isEndsAtBackedge());
    }

    public getSpanningPaths(loop: Loop): LoopPath[] {
        return this.getLoopPaths(loop).filter(path => path.isSpanningPath());
    }

    public getEqPointPaths(loop: Loop): LoopPath[] {
        return this.getLoopPaths(loop).filter(path => path.isEqPointPath());
    }

    public getPathsThroughBlock(loop: Loop, block: BasicBlock): LoopPath[] {
        const paths = this.getLoopPaths(loop);
        this.checkContains(loop, block);
        return paths.filter(path => path.contains(block));
    }

    public spanningPathThroughBlock(loop: Loop, block: BasicBlock): boolean {
        const summary = this.getSummaryFlags(loop);
        this.checkContains(loop, block);
        return summary.hasSpanningPath.get(block) ?? false;
    }

    public eqPointPathThroughBlock(loop: Loop, block: BasicBlock): boolean {
        const summary = this.getSummaryFlags(loop);
        this.checkContains(loop, block);
        return summary.hasEqPointPath.get(block) ?? false;
    }

    /** Returns a copy of the summary of `loop`. */
    public getSummary(loop: Loop): LoopSummary {
        const summary = this.getSummaryFlags(loop);
        return { hasSpanningPath: new Map(summary.hasSpanningPath), hasEqPointPath: new Map(summary.hasEqPointPath) };
    }

    private getSummaryFlags(loop: Loop): SummaryFlags {
        const summary = this.hasPaths(loop) ? this.summaries.get(loop.getId()) : undefined;
        if (!summary) {
            throw new Error(`No paths for ${loop.toString()}.`);
        }
        return summary;
    }

    private getLoopPaths(loop: Loop): LoopPath[] {
        const paths = this.hasPaths(loop) ? this.paths.get(loop.getId()) : undefined;
        if (!paths) {
            throw new Error(`No paths for ${loop.toString()}.`);
        }
        return paths;
    }

    private checkContains(loop: Loop, block: BasicBlock): void {
        if (!loop.contains(block)) {
            throw new Error(`${loop.toString()} does not contain block ${block.getLabel()}.`);
        }
    }

    private reset(): void {
        this.paths.clear();
        this.summaries.clear();
    }

    private finish(name: string): AnalysisError {
        if (this.tooManyPaths) {
            const errMsg = `too many paths in ${name}, bailing on analysis`;
            logger.warn(errMsg);
            this.reset();
            return { errCode: AnalysisErrorCode.LOOP_PATHS_TOO_MANY, errMsg: errMsg };
        }
        if (this.detectedCycle) {
            const errMsg = `detected a cycle in ${name}, bailing on analysis`;
            logger.warn(errMsg);
            this.reset();
            return { errCode: AnalysisErrorCode.LOOP_PATHS_CYCLE_DETECTED, errMsg: errMsg };
        }
        return { errCode: AnalysisErrorCode.OK };
    }

    private analyzeLoop(loop: Loop): boolean {
        const loopInfo = this.getLoopInfo();
        for (const child of loopInfo.getChildren(loop)) {
            if (!this.summaries.has(child.getId())) {
                throw new Error(`Sub-loop ${child.toString()} must be analyzed before ${loop.toString()}.`);
            }
        }
        if (loop.getLatches().length === 0) {
            throw new Error(`No backedges in ${loop.toString()}, not a loop?`);
        }

        logger.debug(`enumerating paths for ${loop.toString()}`);
        this.curLoop = loop;
        this.subLoopBlocks = new Set();
        for (const child of loopInfo.getChildren(loop)) {
            child.getBlocks().forEach(block => this.subLoopBlocks.add(block));
        }
        if (this.subLoopBlocks.has(loop.getHeader())) {
            throw new Error(`Header of ${loop.toString()} is in a sub-loop.`);
        }

        const curPaths: LoopPath[] = [];
        const summary: SummaryFlags = { hasSpanningPath: new Map(), hasEqPointPath: new Map() };
        for (const block of loop.getBlocks()) {
            if (!this.subLoopBlocks.has(block)) {
                summary.hasSpanningPath.set(block, false);
                summary.hasEqPointPath.set(block, false);
            }
        }
        this.paths.set(loop.getId(), curPaths);
        this.summaries.set(loop.getId(), summary);

        const headerStart = loop.getHeader().getHead();
        if (headerStart === null) {
            throw new Error(`Header of ${loop.toString()} is empty.`);
        }
        const newStarts: Stmt[] = [];
        if (!this.loopDfs(headerStart, true, curPaths, summary, newStarts)) {
            return false;
        }
        while (newStarts.length > 0) {
            const start = newStarts.shift();
            if (start === undefined) {
                break;
            }
            if (!this.loopDfs(start, false, curPaths, summary, newStarts)) {
                return false;
            }
        }
        return true;
    }

    private loopDfs(start: Stmt, startsAtHeader: boolean, curPaths: LoopPath[], summary: SummaryFlags, newStarts: Stmt[]): boolean {
        const pathNodes: PathNode[] = [];
        const stack: DfsFrame[] = [];

        const record = (end: Stmt, endsAtBackedge: boolean): boolean => {
            const path = new LoopPath(pathNodes, start, end, startsAtHeader, endsAtBackedge);
            curPaths.push(path);
            if (curPaths.length > this.maxNumPaths) {
                this.tooManyPaths = true;
                return false;
            }
            const flags = startsAtHeader && endsAtBackedge ? summary.hasSpanningPath : summary.hasEqPointPath;
            for (const node of pathNodes) {
                if (!this.subLoopBlocks.has(node.getBlock())) {
                    flags.set(node.getBlock(), true);
                }
            }
            logger.debug(`found path that starts at ${startsAtHeader ? 'the header' : 'an equivalence point'} and ends at ${
                endsAtBackedge ? 'a loop backedge' : 'an equivalence point'}\n${path.toString()}`);
            return true;
        };

        const enter = (stmt: Stmt): boolean => {
            const block = this.getBlockOf(stmt);
            if (pathNodes.some(node => node.getBlock() === block)) {
                this.detectedCycle = true;
                return false;
            }
            const opaque = this.subLoopBlocks.has(block);
            pathNodes.push(new PathNode(block, opaque));
            const steps: DfsStep[] = [];
            if (!(opaque ? this.visitSubLoopBlock(block, steps, record) : this.visitBlock(stmt, block, steps, record))) {
                return false;
            }
            stack.push({ block: block, steps: steps, next: 0 });
            return true;
        };

        if (!enter(start)) {
            return false;
        }
        while (stack.length > 0) {
            const top = stack[stack.length - 1];
            if (top.next >= top.steps.length) {
                stack.pop();
                pathNodes.pop();
                continue;
            }
            const step = top.steps[top.next++];
            if (step.kind === StepKind.VISIT) {
                if (!enter(step.stmt)) {
                    return false;
                }
            } else if (step.kind === StepKind.QUEUE) {
                LoopPathFinder.pushIfNotPresent(step.stmt, newStarts);
            } else {
                // stop at the end of the current block rather than at the point inside the sub-loop
                const term = this.getTerminator(top.block);
                if (!record(term, false)) {
                    return false;
                }
                LoopPathFinder.pushIfNotPresent(step.stmt, newStarts);
            }
        }
        return true;
    }

    private visitBlock(stmt: Stmt, block: BasicBlock, steps: DfsStep[], record: (end: Stmt, endsAtBackedge: boolean) => boolean): boolean {
        const loop = this.getCurLoop();
        const eqPoint = this.findEquivalencePoint(stmt, block);
        if (eqPoint !== null) {
            if (!record(eqPoint, false)) {
                return false;
            }
            // the search restarts after the point, or at the successors when the point ends the block
            const next = block.getNextStmt(eqPoint);
            if (next !== null) {
                steps.push({ kind: StepKind.QUEUE, stmt: next });
                return true;
            }
            for (const succ of block.getSuccessors()) {
                if (!loop.contains(succ) || succ === loop.getHeader()) {
                    continue;
                }
                if (!this.subLoopBlocks.has(succ)) {
                    steps.push({ kind: StepKind.QUEUE, stmt: this.getHead(succ) });
                    continue;
                }
                const exits = this.getSubLoopSuccessors(succ);
                exits.eqPoint.forEach(exit => steps.push({ kind: StepKind.QUEUE, stmt: exit }));
                exits.spanning.forEach(exit => steps.push({ kind: StepKind.VISIT, stmt: exit }));
            }
            return true;
        }

        if (loop.isLatch(block)) {
            return record(this.getTerminator(block), true);
        }

        this.pushSuccessorSteps(block, steps, null);
        return true;
    }

    private visitSubLoopBlock(block: BasicBlock, steps: DfsStep[], record: (end: Stmt, endsAtBackedge: boolean) => boolean): boolean {
        const loop = this.getCurLoop();
        if (loop.isLatch(block)) {
            return record(this.getTerminator(block), true);
        }
        // only successors outside of this sub-loop but still inside the current loop
        const weedOut = this.getLoopInfo().getChildContaining(loop, block);
        if (!weedOut) {
            throw new Error(`Invalid sub-loop block ${block.getLabel()}.`);
        }
        this.pushSuccessorSteps(block, steps, weedOut);
        return true;
    }

    private pushSuccessorSteps(block: BasicBlock, steps: DfsStep[], weedOut: Loop | null): void {
        const loop = this.getCurLoop();
        for (const succ of block.getSuccessors()) {
            if (!loop.contains(succ) || succ === loop.getHeader() || weedOut?.contains(succ)) {
                continue;
            }
            if (!this.subLoopBlocks.has(succ)) {
                steps.push({ kind: StepKind.VISIT, stmt: this.getHead(succ) });
                continue;
            }
            const exits = this.getSubLoopSuccessors(succ);
            exits.eqPoint.forEach(exit => steps.push({ kind: StepKind.SUB_LOOP_EQ_EXIT, stmt: exit }));
            exits.spanning.forEach(exit => steps.push({ kind: StepKind.VISIT, stmt: exit }));
        }
    }

    /**
     * Returns the terminators of the exiting blocks of the sub-loop entered through `succ`,
     * split by what its summary says about them.
     */
    private getSubLoopSuccessors(succ: BasicBlock): { eqPoint: Stmt[]; spanning: Stmt[] } {
        const subLoop = this.getLoopInfo().getChildContaining(this.getCurLoop(), succ);
        if (!subLoop) {
            throw new Error(`Invalid sub-loop block ${succ.getLabel()}.`);
        }
        const summary = this.getSummaryFlags(subLoop);
        let eqPoint: Stmt[] = [];
        let spanning: Stmt[] = [];
        for (const exit of subLoop.getExitingBlocks()) {
            const term = this.getTerminator(exit);
            if (summary.hasSpanningPath.get(exit)) {
                spanning.push(term);
            }
            if (summary.hasEqPointPath.get(exit)) {
                eqPoint.push(term);
            }
        }
        return { eqPoint: eqPoint, spanning: spanning };
    }

    private findEquivalencePoint(stmt: Stmt, block: BasicBlock): Stmt | null {
        const stmts = block.getStmts();
        for (let i = stmts.indexOf(stmt); i >= 0 && i < stmts.length; i++) {
            if (this.classifier.isMigrationPoint(stmts[i])) {
                return stmts[i];
            }
        }
        return null;
    }

    private getCurLoop(): Loop {
        if (!this.curLoop) {
            throw new Error('No loop is being analyzed.');
        }
        return this.curLoop;
    }

    private getBlockOf(stmt: Stmt): BasicBlock {
        const block = this.cfg?.getBlockOf(stmt);
        if (!block) {
            throw new Error(`Statement ${stmt.toString()} is not in the cfg.`);
        }
        return block;
    }

    private getHead(block: BasicBlock): Stmt {
        const head = block.getHead();
        if (head === null) {
            throw new Error(`Block ${block.getLabel()} is empty.`);
        }
        return head;
    }

    private getTerminator(block: BasicBlock): Stmt {
        const term = block.getTerminator();
        if (term === null) {
            throw new Error(`Block ${block.getLabel()} has no terminator.`);
        }
        return term;
    }

    private static pushIfNotPresent(stmt: Stmt, list: Stmt[]): void {
        if (!list.includes(stmt)) {
            list.push(stmt);
        }
    }
}

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

import { Stmt } from '../core/base/Stmt';
import { Value } from '../core/base/Value';
import { AnalysisErrorCode } from '../core/common/AnalysisError';
import { SlotTracker } from '../core/common/SlotTracker';
import { BasicBlock } from '../core/graph/BasicBlock';
import { Loop } from '../core/graph/Loop';
import { LoopPath } from '../core/graph/LoopPath';
import { Routine } from '../core/model/Routine';
import type { LoopReport, MigrationAnalyzer, RoutineReport } from '../MigrationAnalyzer';
import { StackMapDiagnostic, StackMapRecord } from '../transformer/StackMapInserter';
import { Printer } from './Printer';

export interface PathNodeJson {
    block: string;
    subLoopExit: boolean;
}

export interface LoopPathJson {
    start: string;
    end: string;
    startsAtHeader: boolean;
    endsAtBackedge: boolean;
    nodes: PathNodeJson[];
}

export interface LoopJson {
    id: number;
    header: string;
    depth: number;
    parent: number | null;
    latches: string[];
    paths: LoopPathJson[];
    summary: {
        hasSpanningPath: Record<string, boolean>;
        hasEqPointPath: Record<string, boolean>;
    };
}

export interface RoutineResultJson {
    name: string;
    errCode: AnalysisErrorCode;
    errMsg?: string;
    loops: LoopJson[];
}

export interface StackMapJson {
    routine: string;
    id: number;
    callSite: string;
    liveValues: string[];
}

export interface DiagnosticJson {
    routine: string;
    callSite: string;
    message: string;
}

export interface AnalysisJson {
    unit: string;
    modified: boolean;
    routines: RoutineResultJson[];
    stackMaps: StackMapJson[];
    diagnostics: DiagnosticJson[];
}

/**
 * Serializes the results of a {@link MigrationAnalyzer}. Blocks are named by label and
 * values as in the printed text of their routine.
 * @category save
 */
export class JsonPrinter extends Printer {
    private analyzer: MigrationAnalyzer;
    private slotTrackers: Map<Routine, SlotTracker> = new Map();

    constructor(analyzer: MigrationAnalyzer) {
        super();
        this.analyzer = analyzer;
    }

    public dump(): string {
        return JSON.stringify(this.serialize(), null, 2);
    }

    public serialize(): AnalysisJson {
        this.slotTrackers.clear();
        return {
            unit: this.analyzer.getUnit().getName(),
            modified: this.analyzer.isModified(),
            routines: this.analyzer.getRoutineReports().map(report => this.serializeRoutine(report)),
            stackMaps: this.analyzer.getStackMapRecords().map(record => this.serializeStackMap(record)),
            diagnostics: this.analyzer.getDiagnostics().map(diagnostic => this.serializeDiagnostic(diagnostic)),
        };
    }

    private serializeRoutine(report: RoutineReport): RoutineResultJson {
        const json: RoutineResultJson = {
            name: report.routine.getName(),
            errCode: report.result.errCode,
            loops: report.loops.map(loop => this.serializeLoop(report.routine, loop)),
        };
        if (report.result.errMsg !== undefined) {
            json.errMsg = report.result.errMsg;
        }
        return json;
    }

    private serializeLoop(routine: Routine, report: LoopReport): LoopJson {
        const loop = report.loop;
        return {
            id: loop.getId(),
            header: loop.getHeader().getLabel(),
            depth: loop.getDepth(),
            parent: loop.getParentId(),
            latches: loop.getLatches().map(latch => latch.getLabel()),
            paths: report.paths.map(path => this.serializePath(routine, path)),
            summary: {
                hasSpanningPath: JsonPrinter.serializeFlags(loop, report.summary.hasSpanningPath),
                hasEqPointPath: JsonPrinter.serializeFlags(loop, report.summary.hasEqPointPath),
            },
        };
    }

    private serializePath(routine: Routine, path: LoopPath): LoopPathJson {
        return {
            start: this.stmtText(routine, path.getStart()),
            end: this.stmtText(routine, path.getEnd()),
            startsAtHeader: path.isStartsAtHeader(),
            endsAtBackedge: path.isEndsAtBackedge(),
            nodes: path.getNodes().map(node => ({ block: node.getBlock().getLabel(), subLoopExit: node.isSubLoopExit() })),
        };
    }

    private serializeStackMap(record: StackMapRecord): StackMapJson {
        const slots = this.getSlotTracker(record.routine);
        return {
            routine: record.routine.getName(),
            id: record.siteId,
            callSite: this.stmtText(record.routine, record.callSite),
            liveValues: record.liveValues.map(value => slots.format(value)),
        };
    }

    private serializeDiagnostic(diagnostic: StackMapDiagnostic): DiagnosticJson {
        return {
            routine: diagnostic.routine.getName(),
            callSite: this.stmtText(diagnostic.routine, diagnostic.callSite),
            message: diagnostic.message,
        };
    }

    private stmtText(routine: Routine, stmt: Stmt): string {
        const slots = this.getSlotTracker(routine);
        return stmt.toText((value: Value) => slots.format(value));
    }

    private getSlotTracker(routine: Routine): SlotTracker {
        let slots = this.slotTrackers.get(routine);
        if (!slots) {
            slots = new SlotTracker(routine);
            this.slotTrackers.set(routine, slots);
        }
        return slots;
    }

    // member blocks in block order; blocks of sub-loops have no entry
    private static serializeFlags(loop: Loop, flags: ReadonlyMap<BasicBlock, boolean>): Record<string, boolean> {
        const json: Record<string, boolean> = {};
        for (const block of loop.getBlocks()) {
            const flag = flags.get(block);
            if (flag !== undefined) {
                json[block.getLabel()] = flag;
            }
        }
        return json;
    }
}

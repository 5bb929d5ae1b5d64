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
import { Value, ValueFormatter } from '../core/base/Value';
import { AnalysisErrorCode } from '../core/common/AnalysisError';
import { SlotTracker } from '../core/common/SlotTracker';
import { BasicBlock } from '../core/graph/BasicBlock';
import { LoopPath } from '../core/graph/LoopPath';
import { CompilationUnit } from '../core/model/CompilationUnit';
import { Routine } from '../core/model/Routine';
import type { RoutineReport } from '../MigrationAnalyzer';
import { Printer } from './Printer';

const STMT_INDENT = '  ';

/**
 * Renders a unit as text: external declarations first, then every routine with its blocks.
 * Unnamed values are printed as `%N` using the slots of their routine. Given the reports of a
 * loop path analysis, the loop paths of each routine follow its body as comments.
 * @category save
 */
export class TextPrinter extends Printer {
    private unit: CompilationUnit;
    private reports: RoutineReport[];

    constructor(unit: CompilationUnit, reports: RoutineReport[] = []) {
        super();
        this.unit = unit;
        this.reports = reports;
    }

    public dump(): string {
        const lines: string[] = [];
        if (this.unit.getName().length > 0) {
            lines.push(`; unit ${this.unit.getName()}`);
        }
        for (const decl of this.unit.getDeclarations()) {
            if (!this.unit.getRoutine(decl.getName())) {
                lines.push('declare ' + decl.toString());
            }
        }
        for (const routine of this.unit.getRoutines()) {
            lines.push('');
            this.printRoutine(routine, lines);
        }
        return lines.map(line => line + '\n').join('');
    }

    private printRoutine(routine: Routine, lines: string[]): void {
        const slots = new SlotTracker(routine);
        const fmt: ValueFormatter = (value: Value) => slots.format(value);
        const signature = routine.getSignature();
        const params = routine.getParameters().map(param => param.getType().toString() + ' ' + fmt(param));
        if (signature.isVariadic()) {
            params.push('...');
        }
        lines.push(`define ${signature.getReturnType().toString()} @${routine.getName()}(${params.join(', ')}) {`);

        const cfg = routine.getCfg();
        if (cfg) {
            for (const block of cfg.getBlocks()) {
                lines.push(block.getLabel() + ':');
                for (const stmt of block.getStmts()) {
                    lines.push(STMT_INDENT + TextPrinter.stmtText(stmt, block, fmt));
                }
            }
        }
        lines.push('}');

        const report = this.reports.find(r => r.routine === routine);
        if (report) {
            TextPrinter.printReport(report, lines);
        }
    }

    private static stmtText(stmt: Stmt, block: BasicBlock, fmt: ValueFormatter): string {
        const text = stmt.toText(fmt);
        if (!stmt.isTerminator() || block.getSuccessors().length === 0) {
            return text;
        }
        return text + ' -> ' + block.getSuccessors().map(succ => succ.getLabel()).join(', ');
    }

    private static printReport(report: RoutineReport, lines: string[]): void {
        if (report.result.errCode !== AnalysisErrorCode.OK) {
            lines.push(`; loop paths: ${report.result.errMsg ?? 'analysis failed'}`);
            return;
        }
        if (report.loops.length === 0) {
            return;
        }
        lines.push('; loop paths');
        for (const loopReport of report.loops) {
            lines.push('; ' + loopReport.loop.toString());
            for (const path of loopReport.paths) {
                lines.push(';   ' + TextPrinter.pathText(path));
            }
        }
    }

    /** `[H, I (sub-loop exit), M] header -> equivalence point` */
    public static pathText(path: LoopPath): string {
        const nodes = path.getNodes().map(node => node.getBlock().getLabel() + (node.isSubLoopExit() ? ' (sub-loop exit)' : ''));
        const from = path.isStartsAtHeader() ? 'header' : 'equivalence point';
        const to = path.isEndsAtBackedge() ? 'backedge' : 'equivalence point';
        return `[${nodes.join(', ')}] ${from} -> ${to}`;
    }
}

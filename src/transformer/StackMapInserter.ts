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

import { IntConstant } from '../core/base/Constant';
import { AbstractStructuralExpr, CastExpr, InvokeExpr } from '../core/base/Expr';
import { Local } from '../core/base/Local';
import { Parameter } from '../core/base/Parameter';
import { AssignStmt, InvokeStmt, Stmt } from '../core/base/Stmt';
import { IntType, VoidType } from '../core/base/Type';
import { Value } from '../core/base/Value';
import { DEFAULT_STACKMAP_NAME, STACKMAP_FLAGS_BITS, STACKMAP_ID_BITS } from '../core/common/Const';
import { isCallSite, isStackMapCall } from '../core/common/EquivalencePoint';
import { SlotTracker } from '../core/common/SlotTracker';
import { LiveValues, LivenessProvider } from '../core/dataflow/LiveValues';
import { Cfg } from '../core/graph/Cfg';
import { DominanceFinder, DominanceProvider } from '../core/graph/DominanceFinder';
import { CompilationUnit } from '../core/model/CompilationUnit';
import { Routine } from '../core/model/Routine';
import { RoutineSignature } from '../core/model/RoutineSignature';
import Logger, { LOG_MODULE_TYPE } from '../utils/logger';
const logger = Logger.getLogger(LOG_MODULE_TYPE.MIGRATION_ANALYZER, 'StackMapInserter');

export interface StackMapInserterOptions {
    markerName?: string;
    /** Emit markers carrying only the site id and the flags. */
    noLiveValues?: boolean;
    livenessFactory?: (routine: Routine, cfg: Cfg) => LivenessProvider;
    dominanceFactory?: (routine: Routine, cfg: Cfg) => DominanceProvider;
}

export interface StackMapRecord {
    routine: Routine;
    siteId: number;
    callSite: Stmt;
    marker: InvokeStmt;
    liveValues: Value[];
}

export interface StackMapDiagnostic {
    routine: Routine;
    callSite: Stmt;
    message: string;
}

/**
 * Instruments every call site with a call to the stack map marker, recording the values live
 * after the call so that they can be located once registers have been allocated.
 *
 * Some statements hide values from liveness: after `%p = fieldaddr %arr, 0, 1` the backing
 * `%arr` may only be reached through `%p`. Whenever the result of such a statement is live at a
 * call, its operands are recorded too: parameters always, locals only when their definition
 * dominates the call.
 *
 * Running the inserter again first removes the markers of the previous run, so the result
 * does not depend on how many times it ran.
 */
export class StackMapInserter {
    private markerName: string;
    private noLiveValues: boolean;
    private livenessFactory: (routine: Routine, cfg: Cfg) => LivenessProvider;
    private dominanceFactory: (routine: Routine, cfg: Cfg) => DominanceProvider;

    private marker?: RoutineSignature;
    private callSiteId: number = 0;
    private numInstrumented: number = 0;
    private records: StackMapRecord[] = [];
    private diagnostics: StackMapDiagnostic[] = [];

    constructor(options: StackMapInserterOptions = {}) {
        this.markerName = options.markerName ?? DEFAULT_STACKMAP_NAME;
        this.noLiveValues = options.noLiveValues ?? false;
        this.livenessFactory = options.livenessFactory ?? ((_routine, cfg) => new LiveValues(cfg));
        this.dominanceFactory = options.dominanceFactory ?? ((_routine, cfg) => new DominanceFinder(cfg));
    }

    /**
     * Call sites of the routines in `skipped` are left without markers, each reported as a
     * diagnostic. Markers of a previous run are removed from every routine.
     * @returns true if a marker was inserted or removed, or the marker declaration was added.
     */
    public runOnUnit(unit: CompilationUnit, skipped: ReadonlySet<Routine> = new Set()): boolean {
        logger.debug(`begin stack map insertion in unit ${unit.getName()}`);
        this.numInstrumented = 0;
        this.records = [];
        this.diagnostics = [];

        let modified = this.addMarkerDeclaration(unit);
        if (this.removeOldStackMaps(unit)) {
            modified = true;
        }

        for (const routine of unit.getRoutines()) {
            const cfg = routine.getCfg();
            if (!cfg) {
                continue;
            }
            if (skipped.has(routine)) {
                this.reportSkipped(routine, cfg);
                continue;
            }
            logger.debug(`entering routine ${routine.getName()}`);
            this.instrumentRoutine(routine, cfg);
        }

        logger.info(`finished unit ${unit.getName()}, added ${this.numInstrumented} stack maps`);
        return modified || this.numInstrumented > 0;
    }

    public getMarker(): RoutineSignature | undefined {
        return this.marker;
    }

    public getNumInstrumented(): number {
        return this.numInstrumented;
    }

    public getRecords(): StackMapRecord[] {
        return this.records;
    }

    public getDiagnostics(): StackMapDiagnostic[] {
        return this.diagnostics;
    }

    private addMarkerDeclaration(unit: CompilationUnit): boolean {
        const expected = new RoutineSignature(this.markerName,
            [IntType.getInstance(STACKMAP_ID_BITS), IntType.getInstance(STACKMAP_FLAGS_BITS)], VoidType.getInstance(), true);
        const existing = unit.getDeclaration(this.markerName);
        if (existing) {
            if (existing.toString() !== expected.toString()) {
                throw new Error(`Declaration '${existing.toString()}' conflicts with the stack map marker '${expected.toString()}'.`);
            }
            this.marker = existing;
            return false;
        }
        logger.debug(`adding stack map declaration to ${unit.getName()}`);
        this.marker = expected;
        unit.addDeclaration(this.marker);
        return true;
    }

    private reportSkipped(routine: Routine, cfg: Cfg): void {
        logger.warn(`no loop paths for routine ${routine.getName()}, leaving its call sites uninstrumented`);
        for (const stmt of cfg.getStmts()) {
            if (!isCallSite(stmt) || isStackMapCall(stmt, this.markerName)) {
                continue;
            }
            const message = `call site left uninstrumented, loop path analysis failed: ${stmt.toString()}`;
            this.diagnostics.push({ routine: routine, callSite: stmt, message: message });
        }
    }

    private removeOldStackMaps(unit: CompilationUnit): boolean {
        let modified = false;
        for (const routine of unit.getRoutines()) {
            const cfg = routine.getCfg();
            if (!cfg) {
                continue;
            }
            for (const stmt of cfg.getStmts()) {
                if (isStackMapCall(stmt, this.markerName)) {
                    cfg.remove(stmt);
                    modified = true;
                }
            }
        }
        if (modified) {
            logger.warn(`found stack maps of a previous run in unit ${unit.getName()}`);
        }
        return modified;
    }

    private instrumentRoutine(routine: Routine, cfg: Cfg): void {
        const liveness = this.livenessFactory(routine, cfg);
        const dominance = this.dominanceFactory(routine, cfg);
        const slots = new SlotTracker(routine);
        const hidden = StackMapInserter.getHiddenValues(cfg);
        this.callSiteId = 0;

        for (const block of cfg.getBlocks()) {
            logger.debug(`entering block ${block.getLabel()}`);
            for (const stmt of [...block.getStmts()]) {
                if (!isCallSite(stmt) || isStackMapCall(stmt, this.markerName)) {
                    continue;
                }
                const invoke = stmt.getInvokeExpr();
                if (invoke === undefined) {
                    continue;
                }
                if (invoke.mayUnwind()) {
                    const message = `unhandled unwinding call: ${stmt.toString()}`;
                    logger.warn(message);
                    this.diagnostics.push({ routine: routine, callSite: stmt, message: message });
                    continue;
                }

                const liveValues = this.noLiveValues ? [] : this.collectLiveValues(stmt, liveness, dominance, hidden, slots);
                this.insertMarker(routine, cfg, stmt, liveValues);
            }
        }
    }

    private collectLiveValues(call: Stmt, liveness: LivenessProvider, dominance: DominanceProvider,
                              hidden: Map<Local, Value[]>, slots: SlotTracker): Value[] {
        const live = liveness.liveValuesAfter(call);
        const values = new Set<Value>(live);
        for (const [def, operands] of hidden) {
            if (!live.has(def)) {
                continue;
            }
            for (const operand of operands) {
                if (operand instanceof Parameter) {
                    values.add(operand);
                    continue;
                }
                const producer = operand instanceof Local ? operand.getDeclaringStmt() : null;
                if (producer !== null && dominance.stmtDominates(producer, call)) {
                    values.add(operand);
                }
            }
        }
        return slots.sort(values);
    }

    private insertMarker(routine: Routine, cfg: Cfg, call: Stmt, liveValues: Value[]): void {
        const marker = this.marker;
        if (!marker) {
            throw new Error('Stack map declaration has not been added.');
        }
        const siteId = this.callSiteId++;
        const args: Value[] = [new IntConstant(siteId, STACKMAP_ID_BITS), new IntConstant(0, STACKMAP_FLAGS_BITS), ...liveValues];
        const markerStmt = new InvokeStmt(new InvokeExpr(marker, args));
        cfg.insertAfter(markerStmt, call);

        logger.debug(`${call.toString()} ID: ${siteId}, ${liveValues.length} live value(s)`);
        this.records.push({ routine: routine, siteId: siteId, callSite: call, marker: markerStmt, liveValues: liveValues });
        this.numInstrumented++;
    }

    /**
     * Maps the result of every statement which may hide values from liveness to the operands
     * it hides: locals produced by other statements, and parameters.
     */
    private static getHiddenValues(cfg: Cfg): Map<Local, Value[]> {
        const hidden = new Map<Local, Value[]>();
        for (const stmt of cfg.getStmts()) {
            if (!(stmt instanceof AssignStmt) || !StackMapInserter.hidesValues(stmt)) {
                continue;
            }
            const operands: Value[] = [];
            for (const operand of stmt.getRightOp().getUses()) {
                if (operand instanceof Parameter || (operand instanceof Local && operand.getDeclaringStmt() !== null)) {
                    if (!operands.includes(operand)) {
                        operands.push(operand);
                    }
                }
            }
            hidden.set(stmt.getLeftOp(), operands);
        }
        return hidden;
    }

    private static hidesValues(stmt: AssignStmt): boolean {
        const rightOp = stmt.getRightOp();
        return rightOp instanceof AbstractStructuralExpr || (rightOp instanceof CastExpr && rightOp.isReinterpretation());
    }
}

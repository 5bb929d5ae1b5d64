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
import { DEFAULT_STACKMAP_NAME } from './Const';

/**
 * Decides which statements are migration (equivalence) points.
 * @category core/common
 */
export interface MigrationPointClassifier {
    isMigrationPoint(stmt: Stmt): boolean;
}

export function isCallSite(stmt: Stmt): boolean {
    return stmt.containsInvokeExpr();
}

export function isStackMapCall(stmt: Stmt, markerName: string = DEFAULT_STACKMAP_NAME): boolean {
    const invoke = stmt.getInvokeExpr();
    return invoke !== undefined && invoke.getSignature().getName() === markerName;
}

/**
 * Every call site is a migration point, except calls to the stack map marker.
 * @category core/common
 */
export class CallSiteClassifier implements MigrationPointClassifier {
    private markerName: string;

    constructor(markerName: string = DEFAULT_STACKMAP_NAME) {
        this.markerName = markerName;
    }

    public isMigrationPoint(stmt: Stmt): boolean {
        return isCallSite(stmt) && !isStackMapCall(stmt, this.markerName);
    }
}

/**
 * Classifier backed by an explicit set of statements.
 * @category core/common
 */
export class StmtSetClassifier implements MigrationPointClassifier {
    private points: Set<Stmt>;

    constructor(points: Iterable<Stmt> = []) {
        this.points = new Set(points);
    }

    public add(stmt: Stmt): void {
        this.points.add(stmt);
    }

    public isMigrationPoint(stmt: Stmt): boolean {
        return this.points.has(stmt);
    }
}

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

import type { Stmt } from './Stmt';
import { Type, UnknownType } from './Type';
import { Value } from './Value';

/**
 * An SSA value produced by exactly one statement. The name may be empty, in which case
 * printers and orderings fall back to the slot the value gets in its routine.
 * @category core/base
 */
export class Local implements Value {
    private name: string;
    private type: Type;

    private declaringStmt: Stmt | null;

    constructor(name: string = '', type: Type = UnknownType.getInstance()) {
        this.name = name;
        this.type = type;

        this.declaringStmt = null;
    }

    /**
     * Returns the name of local value, or an empty string for an unnamed local.
     */
    public getName(): string {
        return this.name;
    }

    public setName(name: string): void {
        this.name = name;
    }

    public hasName(): boolean {
        return this.name.length > 0;
    }

    public getType(): Type {
        return this.type;
    }

    public setType(newType: Type): void {
        this.type = newType;
    }

    /**
     * Returns the statement defining this local, which is **null** until the local is
     * placed on the left side of an assignment.
     * @example
     * 1. check whether a hidden operand dominates a call site.

    ```typescript
    const def = local.getDeclaringStmt();
    if (def !== null && dominance.dominates(def, callSite)) {
        ...
    }
    ```
     */
    public getDeclaringStmt(): Stmt | null {
        return this.declaringStmt;
    }

    public setDeclaringStmt(declaringStmt: Stmt): void {
        this.declaringStmt = declaringStmt;
    }

    public getUses(): Value[] {
        return [];
    }

    public toString(): string {
        return this.hasName() ? '%' + this.name : '%<unnamed>';
    }
}

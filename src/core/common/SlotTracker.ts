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

import { Local } from '../base/Local';
import { Parameter } from '../base/Parameter';
import { Value } from '../base/Value';
import { Routine } from '../model/Routine';

/**
 * Returns the name of a local or a parameter, or an empty string for any other value and for
 * unnamed ones.
 */
export function getValueName(value: Value): string {
    if (value instanceof Local || value instanceof Parameter) {
        return value.getName();
    }
    return '';
}

/**
 * Numbers the unnamed values of a routine: parameters first, then statement results in block
 * order. Slots depend only on the routine's structure, so they are stable across runs.
 * @category core/common
 */
export class SlotTracker {
    private slots: Map<Value, number> = new Map();
    // every parameter and statement result, in the same order as the slots
    private positions: Map<Value, number> = new Map();

    constructor(routine: Routine) {
        for (const param of routine.getParameters()) {
            this.number(param, param.hasName());
        }
        const cfg = routine.getCfg();
        if (!cfg) {
            return;
        }
        for (const block of cfg.getBlocks()) {
            for (const stmt of block.getStmts()) {
                const def = stmt.getDef();
                if (def !== null) {
                    this.number(def, def.hasName());
                }
            }
        }
    }

    /** Returns the slot of an unnamed value, or -1 if it has none. */
    public getSlot(value: Value): number {
        return this.slots.get(value) ?? -1;
    }

    public getNumSlots(): number {
        return this.slots.size;
    }

    /**
     * Orders values with a name lexically before values without one, which are ordered by slot.
     * Values sharing a name keep the order in which the routine introduces them.
     */
    public compare(a: Value, b: Value): number {
        const nameA = getValueName(a);
        const nameB = getValueName(b);
        if (nameA.length > 0 && nameB.length > 0) {
            if (nameA !== nameB) {
                return nameA < nameB ? -1 : 1;
            }
            return this.position(a) - this.position(b);
        }
        if (nameA.length > 0) {
            return -1;
        }
        if (nameB.length > 0) {
            return 1;
        }
        return this.rank(a) - this.rank(b);
    }

    /** Returns the values sorted by {@link compare}, without duplicates. */
    public sort(values: Iterable<Value>): Value[] {
        return Array.from(new Set(values)).sort((a, b) => this.compare(a, b));
    }

    /** Renders a value, using `%N` for unnamed values that have a slot. */
    public format(value: Value): string {
        const slot = this.getSlot(value);
        if (slot >= 0) {
            return '%' + slot;
        }
        return value.toString();
    }

    private number(value: Value, named: boolean): void {
        if (this.positions.has(value)) {
            return;
        }
        this.positions.set(value, this.positions.size);
        if (!named) {
            this.slots.set(value, this.slots.size);
        }
    }

    private position(value: Value): number {
        return this.positions.get(value) ?? Number.MAX_SAFE_INTEGER;
    }

    private rank(value: Value): number {
        const slot = this.getSlot(value);
        return slot >= 0 ? slot : Number.MAX_SAFE_INTEGER;
    }
}

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

import { Type } from './Type';

/**
 * @category core/base
 */
export interface Value {
    /**
     * Return a list of values which are contained in this {@link Value}.
     * Value is a core interface of the IR and may represent a local, a parameter,
     * a constant or an expression.
     * @returns An **array** of values used by this value.
     */
    getUses(): Value[];

    /**
     * Return the type of this value.
     * @example
     * 1. Check whether a call produces a result.

    ```typescript
    const invokeExpr = stmt.getInvokeExpr();
    if (invokeExpr && !(invokeExpr.getType() instanceof VoidType)) {
        ...
    }
    ```
     */
    getType(): Type;

    toString(): string;
}

/** Names a value when rendering statements; printers pass one that knows unnamed slots. */
export type ValueFormatter = (value: Value) => string;

export const DEFAULT_VALUE_FORMATTER: ValueFormatter = (value: Value) => value.toString();

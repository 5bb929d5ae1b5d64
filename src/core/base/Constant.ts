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

import { FloatType, IntType, PointerType, Type } from './Type';
import { Value } from './Value';

/**
 * @category core/base
 */
export class Constant implements Value {
    private readonly value: string;
    private readonly type: Type;

    constructor(value: string, type: Type) {
        this.value = value;
        this.type = type;
    }

    /**
     * Returns the constant's value as a **string**.
     */
    public getValue(): string {
        return this.value;
    }

    public getUses(): Value[] {
        return [];
    }

    public getType(): Type {
        return this.type;
    }

    public toString(): string {
        return this.type.toString() + ' ' + this.value;
    }
}

export class IntConstant extends Constant {
    constructor(value: number | bigint, bitWidth: number) {
        super(value.toString(), IntType.getInstance(bitWidth));
    }
}

export class FloatConstant extends Constant {
    constructor(value: number, bitWidth: number = 64) {
        super(value.toString(), FloatType.getInstance(bitWidth));
    }
}

export class NullConstant extends Constant {
    private static readonly INSTANCE = new NullConstant();

    constructor() {
        super('null', new PointerType());
    }

    public static getInstance(): NullConstant {
        return this.INSTANCE;
    }
}

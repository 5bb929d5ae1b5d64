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

import { FLOAT_PREFIX, INT_PREFIX, PTR_KEYWORD, UNKNOWN_KEYWORD, VOID_KEYWORD } from '../common/Const';

/**
 * @category core/base/type
 */
export abstract class Type {
    abstract toString(): string;
}

/**
 * unknown type
 * @category core/base/type
 */
export class UnknownType extends Type {
    private static readonly INSTANCE = new UnknownType();

    public static getInstance(): UnknownType {
        return this.INSTANCE;
    }

    constructor() {
        super();
    }

    public toString(): string {
        return UNKNOWN_KEYWORD;
    }
}

/**
 * void type, only used as a return type
 * @category core/base/type
 */
export class VoidType extends Type {
    private static readonly INSTANCE = new VoidType();

    public static getInstance(): VoidType {
        return this.INSTANCE;
    }

    constructor() {
        super();
    }

    public toString(): string {
        return VOID_KEYWORD;
    }
}

/**
 * fixed width integer type, e.g. `i1`, `i32`, `i64`
 * @category core/base/type
 */
export class IntType extends Type {
    private static readonly INSTANCES = new Map<number, IntType>();

    private readonly bitWidth: number;

    public static getInstance(bitWidth: number): IntType {
        let type = this.INSTANCES.get(bitWidth);
        if (!type) {
            type = new IntType(bitWidth);
            this.INSTANCES.set(bitWidth, type);
        }
        return type;
    }

    constructor(bitWidth: number) {
        super();
        this.bitWidth = bitWidth;
    }

    public getBitWidth(): number {
        return this.bitWidth;
    }

    public toString(): string {
        return INT_PREFIX + this.bitWidth;
    }
}

/**
 * @category core/base/type
 */
export class FloatType extends Type {
    private static readonly INSTANCES = new Map<number, FloatType>();

    private readonly bitWidth: number;

    public static getInstance(bitWidth: number): FloatType {
        let type = this.INSTANCES.get(bitWidth);
        if (!type) {
            type = new FloatType(bitWidth);
            this.INSTANCES.set(bitWidth, type);
        }
        return type;
    }

    constructor(bitWidth: number) {
        super();
        this.bitWidth = bitWidth;
    }

    public getBitWidth(): number {
        return this.bitWidth;
    }

    public toString(): string {
        return FLOAT_PREFIX + this.bitWidth;
    }
}

/**
 * @category core/base/type
 */
export class PointerType extends Type {
    private readonly pointeeType: Type;

    constructor(pointeeType: Type = UnknownType.getInstance()) {
        super();
        this.pointeeType = pointeeType;
    }

    public getPointeeType(): Type {
        return this.pointeeType;
    }

    public toString(): string {
        if (this.pointeeType instanceof UnknownType) {
            return PTR_KEYWORD;
        }
        return this.pointeeType.toString() + '*';
    }
}

/**
 * named aggregate with ordered members
 * @category core/base/type
 */
export class StructType extends Type {
    private readonly name: string;
    private readonly memberTypes: Type[];

    constructor(name: string, memberTypes: Type[]) {
        super();
        this.name = name;
        this.memberTypes = memberTypes;
    }

    public getName(): string {
        return this.name;
    }

    public getMemberTypes(): Type[] {
        return this.memberTypes;
    }

    public toString(): string {
        return '%' + this.name;
    }
}

/**
 * @category core/base/type
 */
export class ArrayType extends Type {
    private readonly elementType: Type;
    private readonly length: number;

    constructor(elementType: Type, length: number) {
        super();
        this.elementType = elementType;
        this.length = length;
    }

    public getElementType(): Type {
        return this.elementType;
    }

    public getLength(): number {
        return this.length;
    }

    public toString(): string {
        return `[${this.length} x ${this.elementType.toString()}]`;
    }
}

/**
 * @category core/base/type
 */
export class VectorType extends Type {
    private readonly elementType: Type;
    private readonly length: number;

    constructor(elementType: Type, length: number) {
        super();
        this.elementType = elementType;
        this.length = length;
    }

    public getElementType(): Type {
        return this.elementType;
    }

    public getLength(): number {
        return this.length;
    }

    public toString(): string {
        return `<${this.length} x ${this.elementType.toString()}>`;
    }
}

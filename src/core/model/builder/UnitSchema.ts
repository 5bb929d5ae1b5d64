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

import { z } from 'zod';
import { BinaryOperator, CastOperator } from '../../base/Expr';

// JSON description of a compilation unit.
//
// Value references are strings: `%name` for a named local or parameter, `#key` for an unnamed
// local (the key is only visible inside its routine) and `$index` for a parameter by position.
// Types are written as in the printed IR: `i32`, `f64`, `ptr`, `i8*`, `[4 x i32]`, `<2 x f32>`,
// `%struct.name`, `void`.

const ValueRefSchema = z.string().regex(/^([%#].+|\$\d+)$/, 'expected %name, #key or $index');

const OperandSchema = z.union([
    ValueRefSchema,
    z.object({ int: z.union([z.number().int(), z.string().regex(/^-?\d+$/)]), bits: z.number().int().positive() }).strict(),
    z.object({ float: z.number(), bits: z.number().int().positive().default(64) }).strict(),
    z.null(),
]);

const DefSchema = z.string().min(1).optional();

const TypeSchema = z.string().min(1);
const LabelSchema = z.string().min(1);

const CallSchema = z.object({
    op: z.literal('call'),
    def: DefSchema,
    callee: z.string().min(1),
    args: z.array(OperandSchema).default([]),
    unwind: z.boolean().default(false),
});

const BinopSchema = z.object({
    op: z.literal('binop'),
    def: DefSchema,
    operator: z.nativeEnum(BinaryOperator),
    lhs: OperandSchema,
    rhs: OperandSchema,
});

const CastSchema = z.object({
    op: z.literal('cast'),
    def: DefSchema,
    operator: z.nativeEnum(CastOperator),
    value: OperandSchema,
    type: TypeSchema,
});

const AllocaSchema = z.object({ op: z.literal('alloca'), def: DefSchema, type: TypeSchema });

const LoadSchema = z.object({ op: z.literal('load'), def: DefSchema, ptr: OperandSchema, type: TypeSchema });

const StoreSchema = z.object({ op: z.literal('store'), value: OperandSchema, ptr: OperandSchema });

const PhiSchema = z.object({
    op: z.literal('phi'),
    def: DefSchema,
    type: TypeSchema,
    incoming: z.array(z.object({ value: OperandSchema, block: LabelSchema })).min(1),
});

const FieldAddrSchema = z.object({
    op: z.literal('fieldaddr'),
    def: DefSchema,
    base: OperandSchema,
    indices: z.array(OperandSchema).default([]),
    type: TypeSchema.optional(),
});

const ExtractElementSchema = z.object({ op: z.literal('extractelement'), def: DefSchema, vector: OperandSchema, index: OperandSchema });

const InsertElementSchema = z.object({
    op: z.literal('insertelement'),
    def: DefSchema,
    vector: OperandSchema,
    element: OperandSchema,
    index: OperandSchema,
});

const ExtractValueSchema = z.object({
    op: z.literal('extractvalue'),
    def: DefSchema,
    aggregate: OperandSchema,
    indices: z.array(z.number().int().nonnegative()).min(1),
    type: TypeSchema.optional(),
});

const InsertValueSchema = z.object({
    op: z.literal('insertvalue'),
    def: DefSchema,
    aggregate: OperandSchema,
    value: OperandSchema,
    indices: z.array(z.number().int().nonnegative()).min(1),
});

const GotoSchema = z.object({ op: z.literal('goto'), target: LabelSchema });

const IfSchema = z.object({ op: z.literal('if'), cond: OperandSchema, then: LabelSchema, else: LabelSchema });

const SwitchSchema = z.object({
    op: z.literal('switch'),
    key: OperandSchema,
    cases: z.array(z.object({ value: OperandSchema, target: LabelSchema })),
    default: LabelSchema,
});

const ReturnSchema = z.object({ op: z.literal('return'), value: OperandSchema.optional() });

const UnreachableSchema = z.object({ op: z.literal('unreachable') });

export const StmtSchema = z.discriminatedUnion('op', [
    CallSchema,
    BinopSchema,
    CastSchema,
    AllocaSchema,
    LoadSchema,
    StoreSchema,
    PhiSchema,
    FieldAddrSchema,
    ExtractElementSchema,
    InsertElementSchema,
    ExtractValueSchema,
    InsertValueSchema,
    GotoSchema,
    IfSchema,
    SwitchSchema,
    ReturnSchema,
    UnreachableSchema,
]);

export const BlockSchema = z.object({
    label: LabelSchema,
    stmts: z.array(StmtSchema).min(1),
});

export const RoutineSchema = z.object({
    name: z.string().min(1),
    params: z.array(z.object({ name: z.string().default(''), type: TypeSchema })).default([]),
    returns: TypeSchema.default('void'),
    blocks: z.array(BlockSchema).min(1),
});

export const DeclarationSchema = z.object({
    name: z.string().min(1),
    params: z.array(TypeSchema).default([]),
    returns: TypeSchema.default('void'),
    variadic: z.boolean().default(false),
});

export const UnitSchema = z.object({
    name: z.string().default(''),
    declarations: z.array(DeclarationSchema).default([]),
    routines: z.array(RoutineSchema).default([]),
});

export type OperandJson = z.infer<typeof OperandSchema>;
export type StmtJson = z.infer<typeof StmtSchema>;
export type BlockJson = z.infer<typeof BlockSchema>;
export type RoutineJson = z.infer<typeof RoutineSchema>;
export type DeclarationJson = z.infer<typeof DeclarationSchema>;
export type UnitJson = z.infer<typeof UnitSchema>;

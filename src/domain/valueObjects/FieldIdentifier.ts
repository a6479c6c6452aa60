/**
 * FieldIdentifier Value Object
 * Identifies one field on one specific model instance, for use as a key when
 * tracking per-field state such as validation messages.
 *
 * Two identifiers are equal when they point at the very same model object
 * and have exactly the same field name. Structurally identical but distinct
 * models never compare equal.
 */

import type { LambdaExpression } from '../expressions/Expression.js';
import { analyzeMemberAccess } from '../expressions/MemberAccessAnalyzer.js';
import { evaluate } from '../expressions/ExpressionEvaluator.js';
import { recordAccessor, type Selector } from '../expressions/AccessorRecorder.js';
import { combineHashes, identityHash, stringHash } from '../../lib/utils/HashUtils.js';
import { validateReferenceType, validateString } from '../../lib/utils/ValidationUtils.js';
import { logAccessorResolved } from '../../lib/utils/LoggingUtils.js';

export const REFERENCE_TYPE_REQUIRED_MESSAGE =
    'The model must be a reference-typed object. Primitive values have no identity of their own and cannot be used as models.';

export class FieldIdentifier<TModel extends object = object> {
    private readonly _model: TModel;
    private readonly _fieldName: string;
    private readonly _hashCode: number;

    constructor(model: TModel, fieldName: string) {
        validateReferenceType(model, 'model', REFERENCE_TYPE_REQUIRED_MESSAGE);
        validateString(fieldName, 'fieldName');

        this._model = model;
        this._fieldName = fieldName;
        this._hashCode = combineHashes(identityHash(model), stringHash(fieldName));
        Object.freeze(this);
    }

    get model(): TModel {
        return this._model;
    }

    get fieldName(): string {
        return this._fieldName;
    }

    equals(other: unknown): boolean {
        if (!(other instanceof FieldIdentifier)) {
            return false;
        }
        return this._model === other._model && this._fieldName === other._fieldName;
    }

    hashCode(): number {
        return this._hashCode;
    }

    toString(): string {
        const modelName = this._model.constructor?.name || 'Object';
        return `FieldIdentifier(${modelName}.${this._fieldName})`;
    }

    static create<TModel extends object>(model: TModel, fieldName: string): FieldIdentifier<TModel> {
        return new FieldIdentifier(model, fieldName);
    }

    /**
     * Builds an identifier from `() => target.member`, optionally wrapped in
     * one conversion. The target sub-expression is evaluated once, here.
     */
    static fromExpression(accessor: LambdaExpression): FieldIdentifier {
        const access = analyzeMemberAccess(accessor);
        const model = evaluate(access.target);
        validateReferenceType(model, 'model', REFERENCE_TYPE_REQUIRED_MESSAGE);

        const identifier = new FieldIdentifier(model, access.memberName);
        logAccessorResolved(identifier.fieldName, identifier.model.constructor?.name || 'Object');
        return identifier;
    }

    /**
     * Builds an identifier by recording a selector over `scope`, e.g.
     * `FieldIdentifier.fromAccessor(form, (f) => f.person.email)` identifies
     * `email` on `form.person`. The selector is not run against real objects.
     */
    static fromAccessor<TScope extends object>(scope: TScope, selector: Selector<TScope>): FieldIdentifier {
        return FieldIdentifier.fromExpression(recordAccessor(scope, selector));
    }

    static isValid(model: unknown, fieldName: unknown): boolean {
        try {
            validateReferenceType(model, 'model', REFERENCE_TYPE_REQUIRED_MESSAGE);
            validateString(fieldName, 'fieldName');
            return true;
        } catch {
            return false;
        }
    }
}

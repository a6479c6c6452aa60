import { test, describe, expect } from 'vitest';
import {
    FieldIdentifier,
    ArgumentError,
    ArgumentNullError,
    UnsupportedExpressionError,
    Expressions
} from '../src/index.js';

class TestModel {
    stringProperty = '';
    intProperty = 0;
}

class FormPage {
    model = new TestModel();
    stringPropertyOnThisClass = '';
}

// Reaches the constructor the way untyped callers would.
const construct = (...args: unknown[]): FieldIdentifier => Reflect.construct(FieldIdentifier, args);

describe('FieldIdentifier', () => {
    describe('construction', () => {
        test('should reject a null model', () => {
            let caught: unknown;
            try {
                construct(null, 'somefield');
            } catch (error) {
                caught = error;
            }
            expect(caught).toBeInstanceOf(ArgumentNullError);
            expect(caught).toMatchObject({ paramName: 'model', code: 'ARGUMENT_NULL' });
        });

        test('should reject an undefined model', () => {
            expect(() => construct(undefined, 'somefield')).toThrow(ArgumentNullError);
        });

        test.each([
            ['number', 42],
            ['string', 'text'],
            ['boolean', true],
            ['bigint', 10n],
            ['symbol', Symbol('model')]
        ])('should reject a %s model as value-typed', (_kind, model) => {
            let caught: unknown;
            try {
                construct(model, 'somefield');
            } catch (error) {
                caught = error;
            }
            expect(caught).toBeInstanceOf(ArgumentError);
            expect(caught).not.toBeInstanceOf(ArgumentNullError);
            expect(caught).toMatchObject({ paramName: 'model', code: 'INVALID_ARGUMENT' });
            expect(caught instanceof Error && caught.message.startsWith('The model must be a reference-typed object.')).toBe(true);
        });

        test('should reject a null field name', () => {
            let caught: unknown;
            try {
                construct({}, null);
            } catch (error) {
                caught = error;
            }
            expect(caught).toBeInstanceOf(ArgumentNullError);
            expect(caught).toMatchObject({ paramName: 'fieldName' });
        });

        test('should reject a non-string field name', () => {
            expect(() => construct({}, 7)).toThrow(ArgumentError);
        });

        test('should accept an empty field name', () => {
            const identifier = new FieldIdentifier({}, '');
            expect(identifier.fieldName).toBe('');
        });

        test('should expose the exact model and field name', () => {
            const model = {};
            const identifier = new FieldIdentifier(model, 'someField');
            expect(identifier.model).toBe(model);
            expect(identifier.fieldName).toBe('someField');
        });

        test('should accept arrays, functions and dates as models', () => {
            const list: string[] = [];
            const callback = () => undefined;
            const date = new Date(0);
            expect(new FieldIdentifier(list, 'length').model).toBe(list);
            expect(new FieldIdentifier(callback, 'name').model).toBe(callback);
            expect(new FieldIdentifier(date, 'time').model).toBe(date);
        });

        test('create should behave like the constructor', () => {
            const model = new TestModel();
            expect(FieldIdentifier.create(model, 'stringProperty').equals(new FieldIdentifier(model, 'stringProperty'))).toBe(true);
        });

        test('should be frozen', () => {
            const identifier = new FieldIdentifier({}, 'field');
            expect(Object.isFrozen(identifier)).toBe(true);
        });

        test('isValid should report whether construction would succeed', () => {
            expect(FieldIdentifier.isValid({}, 'field')).toBe(true);
            expect(FieldIdentifier.isValid({}, '')).toBe(true);
            expect(FieldIdentifier.isValid(null, 'field')).toBe(false);
            expect(FieldIdentifier.isValid(3, 'field')).toBe(false);
            expect(FieldIdentifier.isValid({}, undefined)).toBe(false);
        });
    });

    describe('equality and hashing', () => {
        test('distinct models produce distinct hash codes and non-equality', () => {
            const first = new FieldIdentifier({}, 'field');
            const second = new FieldIdentifier({}, 'field');
            expect(first.hashCode()).not.toBe(second.hashCode());
            expect(first.equals(second)).toBe(false);
        });

        test('structurally identical models are still distinct', () => {
            const first = new FieldIdentifier(new TestModel(), 'stringProperty');
            const second = new FieldIdentifier(new TestModel(), 'stringProperty');
            expect(first.equals(second)).toBe(false);
        });

        test('distinct field names produce distinct hash codes and non-equality', () => {
            const model = {};
            const first = new FieldIdentifier(model, 'field1');
            const second = new FieldIdentifier(model, 'field2');
            expect(first.hashCode()).not.toBe(second.hashCode());
            expect(first.equals(second)).toBe(false);
        });

        test('same contents produce same hash codes and equality', () => {
            const model = {};
            const first = new FieldIdentifier(model, 'field');
            const second = new FieldIdentifier(model, 'field');
            expect(first.hashCode()).toBe(second.hashCode());
            expect(first.equals(second)).toBe(true);
            expect(second.equals(first)).toBe(true);
        });

        test('field names are case sensitive', () => {
            const model = {};
            const lower = new FieldIdentifier(model, 'field');
            const pascal = new FieldIdentifier(model, 'Field');
            expect(lower.fieldName).toBe('field');
            expect(pascal.fieldName).toBe('Field');
            expect(lower.hashCode()).not.toBe(pascal.hashCode());
            expect(lower.equals(pascal)).toBe(false);
        });

        test('hash code does not change when the model is mutated', () => {
            const model = new TestModel();
            const identifier = new FieldIdentifier(model, 'stringProperty');
            const before = identifier.hashCode();
            model.stringProperty = 'changed';
            expect(new FieldIdentifier(model, 'stringProperty').hashCode()).toBe(before);
        });

        test('should not equal other kinds of values', () => {
            const model = {};
            const identifier = new FieldIdentifier(model, 'field');
            expect(identifier.equals(null)).toBe(false);
            expect(identifier.equals({ model, fieldName: 'field' })).toBe(false);
        });
    });

    describe('fromExpression', () => {
        test('should read the model and name of a property access', () => {
            const model = new TestModel();
            const identifier = FieldIdentifier.fromExpression(
                Expressions.lambda(Expressions.member(Expressions.constant(model, 'model'), 'stringProperty'))
            );
            expect(identifier.model).toBe(model);
            expect(identifier.fieldName).toBe('stringProperty');
        });

        test('should read the model and name of a field access', () => {
            const model = new TestModel();
            const identifier = FieldIdentifier.fromExpression(
                Expressions.lambda(Expressions.field(Expressions.constant(model), 'stringProperty'))
            );
            expect(identifier.model).toBe(model);
            expect(identifier.fieldName).toBe('stringProperty');
        });

        test('should see through a conversion to object', () => {
            const model = new TestModel();
            const identifier = FieldIdentifier.fromExpression(
                Expressions.lambda(Expressions.convert(Expressions.member(Expressions.constant(model), 'intProperty'), 'object'))
            );
            expect(identifier.model).toBe(model);
            expect(identifier.fieldName).toBe('intProperty');
        });

        test('should evaluate a member-of-constant target to find the model', () => {
            const page = new FormPage();
            const identifier = FieldIdentifier.fromExpression(
                Expressions.lambda(
                    Expressions.member(Expressions.member(Expressions.constant(page, 'this'), 'model'), 'stringProperty')
                )
            );
            expect(identifier.model).toBe(page.model);
            expect(identifier.fieldName).toBe('stringProperty');
        });

        test('should use the enclosing object when the member is read on it directly', () => {
            const page = new FormPage();
            const identifier = FieldIdentifier.fromExpression(
                Expressions.lambda(Expressions.member(Expressions.constant(page, 'this'), 'stringPropertyOnThisClass'))
            );
            expect(identifier.model).toBe(page);
            expect(identifier.fieldName).toBe('stringPropertyOnThisClass');
        });

        test('should reject a method call', () => {
            const model = new TestModel();
            expect(() =>
                FieldIdentifier.fromExpression(Expressions.lambda(Expressions.call(Expressions.constant(model, 'model'), 'toString')))
            ).toThrow(UnsupportedExpressionError);
        });

        test('should reject a value-typed target', () => {
            const expression = Expressions.lambda(Expressions.member(Expressions.constant('text', 'label'), 'length'));
            let caught: unknown;
            try {
                FieldIdentifier.fromExpression(expression);
            } catch (error) {
                caught = error;
            }
            expect(caught).toBeInstanceOf(ArgumentError);
            expect(caught).toMatchObject({ paramName: 'model' });
        });

        test('should reject a target that evaluates to null', () => {
            const expression = Expressions.lambda(Expressions.member(Expressions.constant(null, 'model'), 'name'));
            expect(() => FieldIdentifier.fromExpression(expression)).toThrow(ArgumentNullError);
        });

        test('should evaluate the target exactly once', () => {
            let reads = 0;
            const model = new TestModel();
            const page = {
                get model() {
                    reads++;
                    return model;
                }
            };
            const identifier = FieldIdentifier.fromExpression(
                Expressions.lambda(Expressions.member(Expressions.member(Expressions.constant(page), 'model'), 'intProperty'))
            );
            expect(identifier.model).toBe(model);
            expect(reads).toBe(1);
        });
    });

    describe('fromAccessor', () => {
        test('should identify a property of the scope', () => {
            const page = new FormPage();
            const identifier = FieldIdentifier.fromAccessor(page, (p) => p.stringPropertyOnThisClass);
            expect(identifier.model).toBe(page);
            expect(identifier.fieldName).toBe('stringPropertyOnThisClass');
        });

        test('should identify a property of a nested model', () => {
            const page = new FormPage();
            const identifier = FieldIdentifier.fromAccessor(page, (p) => p.model.intProperty);
            expect(identifier.model).toBe(page.model);
            expect(identifier.fieldName).toBe('intProperty');
        });

        test('should equal an identifier built directly', () => {
            const page = new FormPage();
            const recorded = FieldIdentifier.fromAccessor(page, (p) => p.model.stringProperty);
            const direct = new FieldIdentifier(page.model, 'stringProperty');
            expect(recorded.equals(direct)).toBe(true);
            expect(recorded.hashCode()).toBe(direct.hashCode());
        });

        test('should reject a selector that calls a method last', () => {
            const page = new FormPage();
            expect(() => FieldIdentifier.fromAccessor(page, (p) => p.model.toString())).toThrow(UnsupportedExpressionError);
        });
    });

    test('toString should name the model type and field', () => {
        expect(new FieldIdentifier(new TestModel(), 'stringProperty').toString()).toBe('FieldIdentifier(TestModel.stringProperty)');
        expect(new FieldIdentifier(Object.create(null), 'x').toString()).toBe('FieldIdentifier(Object.x)');
    });
});

import { describe, test } from 'node:test';
import assert from 'node:assert/strict';
import { formatValidationErrors, isRecord, JsonSchema, SchemaValidator } from '../src/schema_validator';

const RULES: JsonSchema = {
    type: 'object',
    required: ['name'],
    properties: {
        name: { type: 'string', pattern: '^[a-z]+$' },
        tags: { type: 'array', items: { type: 'string', enum: ['a', 'b'] } },
        limit: { type: 'number', minimum: 1, maximum: 10 },
        byCourse: { type: 'object', additionalProperties: { type: 'boolean' } },
    },
};

describe('SchemaValidator', () => {
    const validator = new SchemaValidator();
    validator.registerSchema('rules', RULES);

    test('accepts a conforming value', () => {
        const result = validator.validate({ name: 'ok', tags: ['a'], limit: 3, byCourse: { '77': true } }, 'rules');
        assert.deepEqual(result, { valid: true, errors: [] });
    });

    test('reports every violation with its path', () => {
        const result = validator.validate({ tags: ['c'], limit: 11, byCourse: { '77': 'yes' } }, 'rules');

        assert.equal(result.valid, false);
        assert.deepEqual(result.errors, [
            { path: '.name', message: 'Required field missing' },
            { path: '.tags[0]', message: 'Value must be one of: a, b' },
            { path: '.limit', message: 'Value 11 > maximum 10' },
            { path: '.byCourse.77', message: 'Expected type boolean, got string' },
        ]);
    });

    test('checks the pattern of strings', () => {
        const result = validator.validate({ name: 'Bad1' }, 'rules');
        assert.deepEqual(result.errors, [{ path: '.name', message: 'Value does not match pattern: ^[a-z]+$' }]);
    });

    test('fails on an unknown schema id', () => {
        assert.deepEqual(validator.validate({}, 'missing').errors, [{ path: '', message: 'Schema not found: missing' }]);
    });

    test('distinguishes arrays and null from objects', () => {
        assert.deepEqual(validator.validate([], 'rules').errors, [{ path: '', message: 'Expected type object, got array' }]);
        assert.equal(isRecord(null), false);
        assert.equal(isRecord([]), false);
        assert.equal(isRecord({}), true);
    });
});

describe('formatValidationErrors', () => {
    test('joins errors and names the root', () => {
        assert.equal(
            formatValidationErrors([
                { path: '', message: 'Expected type object, got string' },
                { path: '.a', message: 'Required field missing' },
            ]),
            '(root): Expected type object, got string; .a: Required field missing'
        );
    });
});

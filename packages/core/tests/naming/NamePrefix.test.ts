import { describe, it, expect } from 'vitest';
import { addNamePrefix, hasNamePrefix, removeNamePrefix, stripNamePrefix } from '../../src/naming/NamePrefix.js';
import { templateVariables, matchTemplate, expandTemplate } from '../../src/naming/UriTemplateMatcher.js';
import { FormatError } from '../../src/core/errors.js';

describe('NamePrefix', () => {
    it('should join prefix and name with an underscore', () => {
        expect(addNamePrefix('analyze_pricing', 'analytics')).toBe('analytics_analyze_pricing');
    });

    it('should remove exactly the prefix it added', () => {
        expect(removeNamePrefix('analytics_analyze_pricing', 'analytics')).toBe('analyze_pricing');
    });

    it('should report missing prefixes without throwing', () => {
        expect(hasNamePrefix('ping', 'analytics')).toBe(false);
        expect(stripNamePrefix('ping', 'analytics')).toBeUndefined();
    });

    it('should throw FormatError when removing a missing prefix', () => {
        expect(() => removeNamePrefix('ping', 'analytics')).toThrow(FormatError);
    });

    it('should treat an empty prefix as the identity', () => {
        expect(addNamePrefix('ping', '')).toBe('ping');
        expect(removeNamePrefix('ping', '')).toBe('ping');
    });
});

describe('UriTemplateMatcher', () => {
    it('should list variables without operators or modifiers', () => {
        expect(templateVariables('weather://{city}/{+path}{?units,lang}')).toEqual(['city', 'path', 'units', 'lang']);
        expect(templateVariables('files://{dir*}/{name:3}')).toEqual(['dir', 'name']);
    });

    it('should list nothing for a plain URI', () => {
        expect(templateVariables('weather://forecast')).toEqual([]);
    });

    it('should match a URI against a template', () => {
        expect(matchTemplate('weather://{city}/current', 'weather://paris/current')).toEqual({ city: 'paris' });
    });

    it('should return undefined when the URI does not fit', () => {
        expect(matchTemplate('weather://{city}/current', 'weather://paris/tomorrow')).toBeUndefined();
    });

    it('should expand a template', () => {
        expect(expandTemplate('weather://{city}/current', { city: 'oslo' })).toBe('weather://oslo/current');
    });
});

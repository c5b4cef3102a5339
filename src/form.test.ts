import { describe, expect, it } from 'vitest';
import { parseFormData, parseQueryString, urlDecodePlus } from './form';
import { HTTPError, HTTPRequest } from './types';

function request(contentType: string | undefined, body: string): HTTPRequest {
    const headers = new Map<string, string>();
    if (contentType) headers.set('content-type', contentType);
    return {
        method: 'POST',
        path: '/',
        queryString: '',
        version: '1.0',
        headers,
        body: Buffer.from(body),
        params: {},
        signal: new AbortController().signal,
    };
}

describe('urlDecodePlus', () => {
    it('decodes plus signs and percent escapes', () => {
        expect(urlDecodePlus('a+b%20c')).toBe('a b c');
        expect(urlDecodePlus('%D0%BF%D1%80%D0%B8')).toBe('при');
    });

    it('keeps broken escapes', () => {
        expect(urlDecodePlus('100%')).toBe('100%');
        expect(urlDecodePlus('%zz%4')).toBe('%zz%4');
    });
});

describe('parseQueryString', () => {
    it('splits pairs', () => {
        expect(parseQueryString('abc=abc&cde=cde')).toEqual({ abc: 'abc', cde: 'cde' });
    });

    it('handles keys without values and empty pairs', () => {
        expect(parseQueryString('flag&&name=Maggie+Stone&x=')).toEqual({ flag: '', name: 'Maggie Stone', x: '' });
        expect(parseQueryString('')).toEqual({});
    });
});

describe('parseFormData', () => {
    it('decodes urlencoded bodies', () => {
        const req = request('application/x-www-form-urlencoded', 'firstname=Maggie&lastname=Stone');
        expect(parseFormData(req)).toEqual({ firstname: 'Maggie', lastname: 'Stone' });
    });

    it('decodes JSON objects, ignoring content type parameters', () => {
        const req = request('application/json; charset=utf-8', '{"firstname":"Margo","age":3}');
        expect(parseFormData(req)).toEqual({ firstname: 'Margo', age: 3 });
    });

    it('rejects JSON that is not an object', () => {
        expect(() => parseFormData(request('application/json', '[1,2]'))).toThrow(HTTPError);
        expect(() => parseFormData(request('application/json', '{oops'))).toThrow('Malformed JSON body');
    });

    it('returns nothing for other or missing content types', () => {
        expect(parseFormData(request('text/plain', 'hello'))).toEqual({});
        expect(parseFormData(request(undefined, 'a=b'))).toEqual({});
        expect(parseFormData(request('application/json', ''))).toEqual({});
    });
});

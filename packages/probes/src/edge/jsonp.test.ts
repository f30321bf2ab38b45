import { describe, expect, it } from 'vitest';
import { parseJsonp } from './jsonp.js';

describe('parseJsonp', () => {
  it('parses a single-quoted payload', () => {
    const body = "FASTLY.setupPerfmap({'pops': [{'hostname': 'a.example', 'popId': 'AMS'}]});\n";

    expect(parseJsonp(body, 'FASTLY.setupPerfmap')).toEqual({
      pops: [{ hostname: 'a.example', popId: 'AMS' }],
    });
  });

  it('tolerates leading script text', () => {
    const body = "/* generated */ fastly.setPopName({'popname': 'LHR'});";

    expect(parseJsonp(body, 'fastly.setPopName')).toEqual({ popname: 'LHR' });
  });

  it('throws when the callback is absent', () => {
    expect(() => parseJsonp('{}', 'fastly.setPopName')).toThrow(
      'JSONP callback fastly.setPopName not found in response',
    );
  });

  it('throws on malformed payloads', () => {
    expect(() => parseJsonp('fastly.setPopName({popname: LHR});', 'fastly.setPopName')).toThrow(
      'Malformed JSONP payload from fastly.setPopName',
    );
    expect(() => parseJsonp('fastly.setPopName(', 'fastly.setPopName')).toThrow(
      'Unterminated JSONP call to fastly.setPopName',
    );
  });
});

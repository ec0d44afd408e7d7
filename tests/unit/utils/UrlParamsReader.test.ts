import { describe, it, expect } from 'vitest';

import { readConfigFromSearch } from '../../../src/utils/UrlParamsReader';

describe('readConfigFromSearch', () => {
  it('should return null without recognised parameters', () => {
    expect(readConfigFromSearch('')).toBeNull();
    expect(readConfigFromSearch('?page=2')).toBeNull();
  });

  it('should read api_base verbatim', () => {
    expect(readConfigFromSearch('?api_base=http://localhost:8000/api')).toEqual({
      apiBase: 'http://localhost:8000/api',
    });
  });

  it('should decode an encoded api_base', () => {
    expect(
      readConfigFromSearch('?api_base=http%3A%2F%2F10.0.0.5%3A8000%2Fapi')
    ).toEqual({ apiBase: 'http://10.0.0.5:8000/api' });
  });

  it('should treat only the literal "true" as enabled', () => {
    expect(readConfigFromSearch('?debug=true&mock=1')).toEqual({
      debugMode: true,
      enableMock: false,
    });
    expect(readConfigFromSearch('?debug=TRUE')).toEqual({ debugMode: false });
  });

  it('should keep an empty api_base', () => {
    expect(readConfigFromSearch('?api_base=')).toEqual({ apiBase: '' });
  });
});

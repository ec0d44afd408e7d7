import { describe, it, expect } from 'vitest';

import { detectApiBase } from '../../../src/utils/ApiBaseDetector';
import { DEFAULT_DETECTOR_RULES } from '../../../src/utils/constants';
import { createLocation } from '../../helpers/fixtures';

describe('detectApiBase', () => {
  it('should keep protocol and port on loopback hosts', () => {
    expect(detectApiBase(createLocation())).toBe('http://localhost:8100/api');
    expect(
      detectApiBase(createLocation({ protocol: 'https:', port: '3000' }))
    ).toBe('https://localhost:3000/api');
  });

  it('should fall back to the backend port on loopback hosts without a port', () => {
    expect(detectApiBase(createLocation({ hostname: '127.0.0.1', port: '' }))).toBe(
      'http://127.0.0.1:5000/api'
    );
  });

  it('should use the fixed address of a known internal host', () => {
    expect(
      detectApiBase(
        createLocation({ protocol: 'https:', hostname: '10.1.2.198', port: '8080' })
      )
    ).toBe('http://10.1.2.198:5000/api');
  });

  it('should target the backend port on the same server otherwise', () => {
    expect(
      detectApiBase(
        createLocation({ protocol: 'https:', hostname: 'review.example.com', port: '' })
      )
    ).toBe('https://review.example.com:5000/api');
  });

  it('should treat an empty hostname as local development', () => {
    expect(
      detectApiBase({ protocol: 'file:', hostname: '', port: '', search: '' })
    ).toBe('http://localhost:5000/api');
  });

  it('should honour custom rules', () => {
    const rules = {
      ...DEFAULT_DETECTOR_RULES,
      fixedHosts: { 'review.internal': 'http://review.internal:9000/api' },
      defaultPort: '8000',
    };

    expect(detectApiBase(createLocation({ hostname: 'review.internal' }), rules)).toBe(
      'http://review.internal:9000/api'
    );
    expect(detectApiBase(createLocation({ hostname: 'other.host' }), rules)).toBe(
      'http://other.host:8000/api'
    );
  });
});

import { describe, it, expect } from 'vitest';
import * as fc from 'fast-check';
import { createHash } from 'node:crypto';
import { createFingerprint, fingerprintAnalysis } from '../orchestration/fingerprint.js';

describe('createFingerprint', () => {
  it('should hash the JSON-encoded components under a namespace', () => {
    const expected = createHash('sha256').update('["p-1",true]').digest('hex').slice(0, 32);
    expect(createFingerprint('analysis', ['p-1', true])).toBe(`analysis:${expected}`);
  });

  it('should not confuse component boundaries', () => {
    expect(createFingerprint('ns', ['a:b', 'c'])).not.toBe(createFingerprint('ns', ['a', 'b:c']));
    expect(createFingerprint('ns', ['a|b', 'c'])).not.toBe(createFingerprint('ns', ['a', 'b|c']));
  });

  it('should require at least one component', () => {
    expect(() => createFingerprint('ns', [])).toThrow(
      'At least one component is required for a fingerprint'
    );
  });

  it('should be deterministic', () => {
    const component = fc.oneof(fc.string(), fc.integer(), fc.boolean());
    fc.assert(
      fc.property(fc.array(component, { minLength: 1 }), (parts) => {
        expect(createFingerprint('ns', parts)).toBe(createFingerprint('ns', [...parts]));
      })
    );
  });
});

describe('fingerprintAnalysis', () => {
  const base = { patientId: 'patient-42', includeRecommendations: true };

  it('should produce a 32 character hex key', () => {
    expect(fingerprintAnalysis(base)).toMatch(/^analysis:[0-9a-f]{32}$/);
  });

  it('should ignore case and padding of labels', () => {
    expect(fingerprintAnalysis({ ...base, specialty: ' Cardiology ' })).toBe(
      fingerprintAnalysis({ ...base, specialty: 'cardiology' })
    );
  });

  it('should treat an empty label as absent', () => {
    expect(fingerprintAnalysis({ ...base, analysisFocus: '  ' })).toBe(fingerprintAnalysis(base));
  });

  it('should distinguish every parameter', () => {
    const keys = new Set([
      fingerprintAnalysis(base),
      fingerprintAnalysis({ ...base, patientId: 'patient-43' }),
      fingerprintAnalysis({ ...base, includeRecommendations: false }),
      fingerprintAnalysis({ ...base, specialty: 'cardiology' }),
      fingerprintAnalysis({ ...base, analysisFocus: 'cardiology' }),
      fingerprintAnalysis({ ...base, adapterId: 'cardiology' }),
    ]);
    expect(keys.size).toBe(6);
  });

  it('should compare patient IDs verbatim', () => {
    expect(fingerprintAnalysis({ ...base, patientId: 'Patient-42' })).not.toBe(
      fingerprintAnalysis(base)
    );
  });
});

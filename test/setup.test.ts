/**
 * Setup Test
 * 
 * Verifies that the test infrastructure is working correctly.
 */

import { loadEnvironmentConfig } from '../src/config/environment';
import { SquadRepository } from '../src';

describe('Project Setup', () => {
  it('should have TypeScript configured correctly', () => {
    expect(true).toBe(true);
  });

  it('should be able to import from src', () => {
    expect(typeof loadEnvironmentConfig).toBe('function');
    expect(typeof SquadRepository).toBe('function');
  });
});

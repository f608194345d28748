/**
 * Analytical elastic wave model for a laterally confined 1D column
 */

import { POISSON_RATIO_LIMIT, isValidNumber } from '@columnwave/shared';
import { DomainError } from '../errors/index.js';
import type { ColumnLoad, MaterialParameters } from '../schema/index.js';

// ============================================================================
// Elastic Moduli
// ============================================================================

function assertMaterial(youngModulus: number, poissonRatio: number, density?: number): void {
  if (!isValidNumber(youngModulus) || youngModulus <= 0) {
    throw new DomainError(`Young's modulus must be positive, got ${youngModulus}`, { youngModulus });
  }
  if (!isValidNumber(poissonRatio) || poissonRatio < 0 || poissonRatio >= POISSON_RATIO_LIMIT) {
    throw new DomainError(`Poisson ratio must lie in [0, ${POISSON_RATIO_LIMIT}), got ${poissonRatio}`, {
      poissonRatio,
    });
  }
  if (density !== undefined && (!isValidNumber(density) || density <= 0)) {
    throw new DomainError(`Density must be positive, got ${density}`, { density });
  }
}

/**
 * Constrained (oedometric) modulus
 * Ec = E(1-ν) / ((1+ν)(1-2ν))
 */
export function constrainedModulus(youngModulus: number, poissonRatio: number): number {
  assertMaterial(youngModulus, poissonRatio);
  return (youngModulus * (1 - poissonRatio)) / ((1 + poissonRatio) * (1 - 2 * poissonRatio));
}

// ============================================================================
// Wave Velocities
// ============================================================================

/**
 * P-wave velocity in a confined column
 * vp = sqrt(E(1-ν) / ((1+ν)(1-2ν)ρ))
 *
 * This is the oedometric speed, not the unconfined bar speed sqrt(E/ρ).
 */
export function computePWaveVelocity(youngModulus: number, poissonRatio: number, density: number): number {
  assertMaterial(youngModulus, poissonRatio, density);
  const vp = Math.sqrt(constrainedModulus(youngModulus, poissonRatio) / density);
  if (!isValidNumber(vp) || vp <= 0) {
    throw new DomainError(`P-wave velocity is not a positive finite number (${vp})`, {
      youngModulus,
      poissonRatio,
      density,
    });
  }
  return vp;
}

/**
 * Acoustic impedance Z = vp·ρ
 */
export function acousticImpedance(pWaveVelocity: number, density: number): number {
  return pWaveVelocity * density;
}

/**
 * Steady particle velocity behind the wavefront for a constant load
 * v = q / (vp·ρ)
 *
 * Sign follows the load.
 */
export function computeExpectedParticleVelocity(load: number, pWaveVelocity: number, density: number): number {
  if (!isValidNumber(load)) {
    throw new DomainError(`Load must be a finite number, got ${load}`, { load });
  }
  const impedance = acousticImpedance(pWaveVelocity, density);
  if (!isValidNumber(impedance) || impedance <= 0 || pWaveVelocity <= 0 || density <= 0) {
    throw new DomainError('Impedance vp·ρ must be positive and finite', { pWaveVelocity, density });
  }
  return load / impedance;
}

// ============================================================================
// Analytical Reference
// ============================================================================

/** Quantities derived once per validation case */
export interface AnalyticalReference {
  readonly pWaveVelocity: number;
  readonly impedance: number;
  readonly expectedParticleVelocity: number;
}

/**
 * Derive the analytical reference for a material and load
 */
export function createAnalyticalReference(material: MaterialParameters, load: ColumnLoad): AnalyticalReference {
  const pWaveVelocity = computePWaveVelocity(material.youngModulus, material.poissonRatio, material.density);
  return Object.freeze({
    pWaveVelocity,
    impedance: acousticImpedance(pWaveVelocity, material.density),
    expectedParticleVelocity: computeExpectedParticleVelocity(load.magnitude, pWaveVelocity, material.density),
  });
}

/**
 * Time for the wavefront to travel a distance
 */
export function travelTime(distance: number, pWaveVelocity: number): number {
  return distance / pWaveVelocity;
}

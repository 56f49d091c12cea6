import { bn254 } from '@noble/curves/bn254';
import { ErrorHandler } from '../errors/ErrorHandler';
import {
  G1Point,
  G2Point,
  SnarkjsProof,
  SnarkjsVerificationKey,
  SnarkProof,
  VerifyingKey
} from '../types/ZKProof';
import { assertInField, SNARK_PRIME, SNARK_SCALAR_FIELD } from '../utils/math';

type G1 = ReturnType<typeof bn254.G1.ProjectivePoint.fromAffine>;
type G2 = ReturnType<typeof bn254.G2.ProjectivePoint.fromAffine>;

const { Fp2, Fp12 } = bn254.fields;

function isIdentity(point: G1Point): boolean {
  return point.x === 0n && point.y === 0n;
}

function isIdentity2(point: G2Point): boolean {
  return point.x[0] === 0n && point.x[1] === 0n && point.y[0] === 0n && point.y[1] === 0n;
}

/**
 * Range-checks every coordinate of a G1 point against the base field
 */
export function assertG1Coordinates(point: G1Point, label: string): void {
  assertInField(point.x, `${label}.x`, SNARK_PRIME);
  assertInField(point.y, `${label}.y`, SNARK_PRIME);
}

export function assertG2Coordinates(point: G2Point, label: string): void {
  assertInField(point.x[0], `${label}.x.c0`, SNARK_PRIME);
  assertInField(point.x[1], `${label}.x.c1`, SNARK_PRIME);
  assertInField(point.y[0], `${label}.y.c0`, SNARK_PRIME);
  assertInField(point.y[1], `${label}.y.c1`, SNARK_PRIME);
}

export function assertProofCoordinates(proof: SnarkProof): void {
  assertG1Coordinates(proof.a, 'proof.a');
  assertG2Coordinates(proof.b, 'proof.b');
  assertG1Coordinates(proof.c, 'proof.c');
}

export function assertVerifyingKeyCoordinates(key: VerifyingKey): void {
  assertG1Coordinates(key.alpha1, 'alpha1');
  assertG2Coordinates(key.beta2, 'beta2');
  assertG2Coordinates(key.gamma2, 'gamma2');
  assertG2Coordinates(key.delta2, 'delta2');
  key.ic.forEach((point, i) => assertG1Coordinates(point, `ic[${i}]`));
}

function toG1(point: G1Point, label: string): G1 {
  assertG1Coordinates(point, label);
  if (isIdentity(point)) {
    return bn254.G1.ProjectivePoint.ZERO;
  }
  try {
    const projective = bn254.G1.ProjectivePoint.fromAffine({ x: point.x, y: point.y });
    projective.assertValidity();
    return projective;
  } catch (error) {
    throw ErrorHandler.createFormatError(`${label} is not a valid G1 point`, {
      error: error instanceof Error ? error.message : String(error)
    });
  }
}

// Curve equation plus r * P == 0, computed as (r - 1) * P + P
function assertG2Subgroup(point: G2): void {
  const { x, y } = point.toAffine();
  const rhs = Fp2.add(Fp2.mul(Fp2.sqr(x), x), bn254.G2.CURVE.b);
  if (!Fp2.eql(Fp2.sqr(y), rhs)) {
    throw new Error('point is not on the curve');
  }
  if (!point.multiplyUnsafe(SNARK_SCALAR_FIELD - 1n).add(point).is0()) {
    throw new Error('point is not in the prime-order subgroup');
  }
}

function toG2(point: G2Point, label: string): G2 {
  assertG2Coordinates(point, label);
  if (isIdentity2(point)) {
    return bn254.G2.ProjectivePoint.ZERO;
  }
  try {
    const projective = bn254.G2.ProjectivePoint.fromAffine({
      x: { c0: point.x[0], c1: point.x[1] },
      y: { c0: point.y[0], c1: point.y[1] }
    });
    assertG2Subgroup(projective);
    return projective;
  } catch (error) {
    throw ErrorHandler.createFormatError(`${label} is not a valid G2 point`, {
      error: error instanceof Error ? error.message : String(error)
    });
  }
}

/**
 * Groth16 check over BN254:
 *   e(-A, B) * e(alpha, beta) * e(L, gamma) * e(C, delta) == 1
 * with L = ic[0] + sum(input_i * ic[i + 1]). Terms with an identity point contribute 1.
 *
 * Malformed points or out-of-range inputs throw FormatError; a well-formed proof that does not
 * satisfy the equation returns false.
 */
export function verifyGroth16(key: VerifyingKey, proof: SnarkProof, publicInputs: bigint[]): boolean {
  if (key.ic.length !== publicInputs.length + 1) {
    throw ErrorHandler.createFormatError('Public input count does not match verifying key', {
      expected: key.ic.length - 1,
      actual: publicInputs.length
    });
  }
  publicInputs.forEach((input, i) => assertInField(input, `publicInputs[${i}]`, SNARK_SCALAR_FIELD));

  const a = toG1(proof.a, 'proof.a');
  const b = toG2(proof.b, 'proof.b');
  const c = toG1(proof.c, 'proof.c');

  let linearCombination = toG1(key.ic[0], 'ic[0]');
  publicInputs.forEach((input, i) => {
    linearCombination = linearCombination.add(toG1(key.ic[i + 1], `ic[${i + 1}]`).multiplyUnsafe(input));
  });

  const terms: Array<[G1, G2]> = [
    [a.negate(), b],
    [toG1(key.alpha1, 'alpha1'), toG2(key.beta2, 'beta2')],
    [linearCombination, toG2(key.gamma2, 'gamma2')],
    [c, toG2(key.delta2, 'delta2')]
  ];

  let product = Fp12.ONE;
  for (const [g1, g2] of terms) {
    if (g1.is0() || g2.is0()) {
      continue;
    }
    product = Fp12.mul(product, bn254.pairing(g1, g2, false));
  }

  return Fp12.eql(Fp12.finalExponentiate(product), Fp12.ONE);
}

function parseG1(coordinates: string[], label: string): G1Point {
  if (coordinates.length < 2) {
    throw ErrorHandler.createFormatError(`${label} must have at least 2 coordinates`, { label });
  }
  return { x: BigInt(coordinates[0]), y: BigInt(coordinates[1]) };
}

function parseG2(coordinates: string[][], label: string): G2Point {
  if (coordinates.length < 2 || coordinates[0].length !== 2 || coordinates[1].length !== 2) {
    throw ErrorHandler.createFormatError(`${label} must have 2 Fp2 coordinates`, { label });
  }
  return {
    x: [BigInt(coordinates[0][0]), BigInt(coordinates[0][1])],
    y: [BigInt(coordinates[1][0]), BigInt(coordinates[1][1])]
  };
}

/**
 * Converts a snarkjs verification_key.json into a verifying key
 */
export function verifyingKeyFromSnarkjs(json: SnarkjsVerificationKey, artifactsIPFSHash?: string): VerifyingKey {
  if (json.protocol !== 'groth16') {
    throw ErrorHandler.createFormatError('Only groth16 verification keys are supported', { protocol: json.protocol });
  }
  return {
    artifactsIPFSHash,
    alpha1: parseG1(json.vk_alpha_1, 'vk_alpha_1'),
    beta2: parseG2(json.vk_beta_2, 'vk_beta_2'),
    gamma2: parseG2(json.vk_gamma_2, 'vk_gamma_2'),
    delta2: parseG2(json.vk_delta_2, 'vk_delta_2'),
    ic: json.IC.map((point, i) => parseG1(point, `IC[${i}]`))
  };
}

export function proofFromSnarkjs(json: SnarkjsProof): SnarkProof {
  return {
    a: parseG1(json.pi_a, 'pi_a'),
    b: parseG2(json.pi_b, 'pi_b'),
    c: parseG1(json.pi_c, 'pi_c')
  };
}

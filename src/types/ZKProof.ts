export interface G1Point {
  x: bigint;
  y: bigint;
}

/** Fp2 coordinates are stored as [c0, c1]. */
export interface G2Point {
  x: [bigint, bigint];
  y: [bigint, bigint];
}

export interface SnarkProof {
  a: G1Point;
  b: G2Point;
  c: G1Point;
}

export interface VerifyingKey {
  artifactsIPFSHash?: string;
  alpha1: G1Point;
  beta2: G2Point;
  gamma2: G2Point;
  delta2: G2Point;
  ic: G1Point[];
}

/** Selects the trusted-setup key: (input note count, output note count). */
export interface CircuitShape {
  nullifiers: number;
  commitments: number;
}

export type SignalValue = bigint | SignalValue[];

/** Private and public circuit inputs, keyed by circuit signal name. */
export interface CircuitWitness {
  merkleRoot: bigint;
  boundParamsHash: bigint;
  nullifiers: bigint[];
  commitmentsOut: bigint[];
  token: bigint;
  publicKey: [bigint, bigint];
  signature: [bigint, bigint, bigint];
  randomIn: bigint[];
  valueIn: bigint[];
  pathElements: bigint[][];
  leavesIndices: bigint[];
  nullifyingKey: bigint;
  npkOut: bigint[];
  valueOut: bigint[];
}

export interface ProofResult {
  proof: SnarkProof;
  publicInputs: bigint[];
}

/**
 * External proving backend. Receives the witness for a given shape and returns a proof
 * whose single public input is the folded transaction hash.
 */
export interface ProvingBackend {
  prove(shape: CircuitShape, witness: CircuitWitness): Promise<ProofResult>;
}

/** snarkjs verification_key.json layout */
export interface SnarkjsVerificationKey {
  protocol: string;
  curve: string;
  nPublic: number;
  vk_alpha_1: string[];
  vk_beta_2: string[][];
  vk_gamma_2: string[][];
  vk_delta_2: string[][];
  IC: string[][];
}

/** snarkjs proof.json layout */
export interface SnarkjsProof {
  pi_a: string[];
  pi_b: string[][];
  pi_c: string[];
  protocol: string;
  curve?: string;
}

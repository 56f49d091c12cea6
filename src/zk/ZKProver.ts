import { promises as fs } from 'fs';
import * as path from 'path';
import * as snarkjs from 'snarkjs';
import { ErrorHandler, ErrorType, ShieldPoolError } from '../errors/ErrorHandler';
import { CircuitShape, CircuitWitness, ProofResult, ProvingBackend, SignalValue } from '../types/ZKProof';
import { Logger } from '../utils/logger';
import { proofFromSnarkjs } from './snark';

export interface CircuitConfig {
  wasmPath?: string;
  zkeyPath?: string;
  wasmBuffer?: Uint8Array;
  zkeyBuffer?: Uint8Array;
}

export function circuitName(shape: CircuitShape): string {
  return `${shape.nullifiers}x${shape.commitments}`;
}

/**
 * Flattens the witness into the signal map the circuit expects
 */
export function toCircuitSignals(witness: CircuitWitness): Record<string, SignalValue> {
  return {
    merkleRoot: witness.merkleRoot,
    boundParamsHash: witness.boundParamsHash,
    nullifiers: witness.nullifiers,
    commitmentsOut: witness.commitmentsOut,
    token: witness.token,
    publicKey: witness.publicKey,
    signature: witness.signature,
    randomIn: witness.randomIn,
    valueIn: witness.valueIn,
    pathElements: witness.pathElements,
    leavesIndices: witness.leavesIndices,
    nullifyingKey: witness.nullifyingKey,
    npkOut: witness.npkOut,
    valueOut: witness.valueOut
  };
}

/**
 * Proves with snarkjs from per-shape circuit artifacts. Artifacts are named `<n>x<m>.wasm` and
 * `<n>x<m>.zkey` when loaded from a directory.
 */
export class SnarkjsProvingBackend implements ProvingBackend {
  private readonly circuitConfigs: Map<string, CircuitConfig>;

  constructor(circuitConfigs?: Map<string, CircuitConfig>) {
    this.circuitConfigs = circuitConfigs ?? new Map();
  }

  static fromDirectory(circuitPath: string, shapes: CircuitShape[]): SnarkjsProvingBackend {
    const configs = new Map<string, CircuitConfig>();
    for (const shape of shapes) {
      const name = circuitName(shape);
      configs.set(name, {
        wasmPath: path.join(circuitPath, `${name}.wasm`),
        zkeyPath: path.join(circuitPath, `${name}.zkey`)
      });
    }
    return new SnarkjsProvingBackend(configs);
  }

  static fromBuffers(circuitBuffers: Record<string, { wasmBuffer: Uint8Array; zkeyBuffer: Uint8Array }>): SnarkjsProvingBackend {
    const configs = new Map<string, CircuitConfig>();
    for (const [circuit, buffers] of Object.entries(circuitBuffers)) {
      configs.set(circuit, { wasmBuffer: buffers.wasmBuffer, zkeyBuffer: buffers.zkeyBuffer });
    }
    return new SnarkjsProvingBackend(configs);
  }

  public hasCircuit(shape: CircuitShape): boolean {
    return this.circuitConfigs.has(circuitName(shape));
  }

  public async prove(shape: CircuitShape, witness: CircuitWitness): Promise<ProofResult> {
    const { wasmBuffer, zkeyBuffer } = await this.loadCircuitFiles(shape);
    const { proof, publicSignals } = await snarkjs.groth16.fullProve(toCircuitSignals(witness), wasmBuffer, zkeyBuffer);
    return {
      proof: proofFromSnarkjs(proof),
      publicInputs: publicSignals.map(signal => BigInt(signal))
    };
  }

  private async loadCircuitFiles(shape: CircuitShape): Promise<{ wasmBuffer: Uint8Array; zkeyBuffer: Uint8Array }> {
    const name = circuitName(shape);
    const config = this.circuitConfigs.get(name);
    if (!config) {
      throw new ShieldPoolError(
        `${name} circuit configuration not found`,
        ErrorType.CONFIGURATION_ERROR,
        { circuit: name },
        {
          action: 'Load circuit configuration',
          description: `No proving artifacts are configured for the ${name} circuit.`
        },
        false
      );
    }

    if (config.wasmBuffer && config.zkeyBuffer) {
      return { wasmBuffer: config.wasmBuffer, zkeyBuffer: config.zkeyBuffer };
    }

    if (config.wasmPath && config.zkeyPath) {
      const [wasmBuffer, zkeyBuffer] = await Promise.all([
        fs.readFile(config.wasmPath),
        fs.readFile(config.zkeyPath)
      ]);
      return { wasmBuffer, zkeyBuffer };
    }

    throw new ShieldPoolError(
      `Incomplete circuit configuration for ${name}`,
      ErrorType.CONFIGURATION_ERROR,
      { circuit: name },
      {
        action: 'Provide complete circuit configuration',
        description: 'Provide either both file paths or both buffers.'
      },
      false
    );
  }
}

/**
 * Runs a proving backend and checks that the proof commits to the public input the ledger
 * will re-derive.
 */
export class ZKProver {
  private readonly logger = Logger.getInstance();

  constructor(private readonly backend: ProvingBackend) {}

  async generateProof(shape: CircuitShape, witness: CircuitWitness, expectedPublicInput: bigint): Promise<ProofResult> {
    const startedAt = Date.now();
    let result: ProofResult;
    try {
      result = await this.backend.prove(shape, witness);
    } catch (error) {
      const errorMessage = error instanceof Error ? error.message : 'Unknown error';
      throw ErrorHandler.getInstance().handleError(
        ErrorHandler.createProofGenerationError(`Failed to generate proof: ${errorMessage}`, {
          circuit: circuitName(shape)
        })
      );
    }

    if (result.publicInputs.length !== 1 || result.publicInputs[0] !== expectedPublicInput) {
      throw ErrorHandler.createProofGenerationError('Proving backend returned unexpected public inputs', {
        circuit: circuitName(shape),
        publicInputs: result.publicInputs.length
      });
    }

    this.logger.info('Proof generated', { circuit: circuitName(shape), durationMs: Date.now() - startedAt });
    return result;
  }
}

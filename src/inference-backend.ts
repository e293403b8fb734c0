// Contract between the InferenceResource and the runtime that actually executes
// the classifier. The resource owns lifecycle policy; a backend only binds
// model bytes to a compute path and runs tensors through the bound session.

import type { AcceleratorKind } from "./types.js";

export interface TensorDescriptor {
  name: string;
  dims: readonly number[];
  type: "float32";
}

export interface ModelSession {
  readonly accelerator: AcceleratorKind;
  /** @throws Error if the session is closed or its metadata is unreadable */
  inputDescriptor(): TensorDescriptor;
  /** @throws Error if the session is closed or its metadata is unreadable */
  outputDescriptor(): TensorDescriptor;
  run(input: Float32Array): Promise<Float32Array>;
  release(): Promise<void>;
}

export interface SerializationOptions {
  optimizedModelPath: string;
  cachedModel: Uint8Array | null;
}

export interface BindOptions {
  accelerator: AcceleratorKind;
  /** Present only on the first accelerated attempt when a cache directory is configured. */
  serialization?: SerializationOptions;
}

export interface InferenceBackend {
  readonly name: string;
  /** Whether the accelerated path can be attempted on this host at all. */
  acceleratorSupported(): Promise<boolean>;
  bind(model: Uint8Array, options: BindOptions): Promise<ModelSession>;
}

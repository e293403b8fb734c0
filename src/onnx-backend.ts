/**
 * ONNX Runtime backend.
 *
 * The accelerated path is the WebGPU execution provider; the fallback path is
 * the WebAssembly CPU provider. On hosts without a WebGPU adapter the resource
 * skips straight to the fallback path.
 */

import * as ort from "onnxruntime-web";
import type { AcceleratorKind } from "./types.js";
import type {
  BindOptions,
  InferenceBackend,
  ModelSession,
  TensorDescriptor,
} from "./inference-backend.js";

const EXECUTION_PROVIDERS: Record<AcceleratorKind, string> = {
  accelerated: "webgpu",
  fallback: "wasm",
};

export interface OnnxBackendOptions {
  inputDims: readonly number[];
  outputDims: readonly number[];
  /** WebAssembly worker threads for the fallback path. Default: 4 */
  numThreads?: number;
}

class OnnxModelSession implements ModelSession {
  private closed = false;

  constructor(
    private readonly session: ort.InferenceSession,
    readonly accelerator: AcceleratorKind,
    private readonly inputDims: readonly number[],
    private readonly outputDims: readonly number[],
  ) {}

  inputDescriptor(): TensorDescriptor {
    return { name: this.ioName(this.session.inputNames, "input"), dims: this.inputDims, type: "float32" };
  }

  outputDescriptor(): TensorDescriptor {
    return { name: this.ioName(this.session.outputNames, "output"), dims: this.outputDims, type: "float32" };
  }

  async run(input: Float32Array): Promise<Float32Array> {
    const inputName = this.inputDescriptor().name;
    const outputName = this.outputDescriptor().name;
    const feeds = { [inputName]: new ort.Tensor("float32", input, [...this.inputDims]) };
    const results = await this.session.run(feeds);
    const output = results[outputName];
    if (!output || !(output.data instanceof Float32Array)) {
      throw new Error(`Output "${outputName}" is missing or not float32`);
    }
    return output.data;
  }

  async release(): Promise<void> {
    if (this.closed) return;
    this.closed = true;
    await this.session.release();
  }

  private ioName(names: readonly string[], kind: string): string {
    if (this.closed) {
      throw new Error(`Session is released; ${kind} metadata unavailable`);
    }
    const name = names[0];
    if (!name) {
      throw new Error(`Model declares no ${kind} tensor`);
    }
    return name;
  }
}

export class OnnxBackend implements InferenceBackend {
  readonly name = "onnxruntime-web";

  constructor(private readonly options: OnnxBackendOptions) {
    ort.env.wasm.numThreads = options.numThreads ?? 4;
  }

  async acceleratorSupported(): Promise<boolean> {
    const nav: unknown = Reflect.get(globalThis, "navigator");
    return typeof nav === "object" && nav !== null && "gpu" in nav;
  }

  async bind(model: Uint8Array, options: BindOptions): Promise<ModelSession> {
    const sessionOptions: ort.InferenceSession.SessionOptions = {
      executionProviders: [EXECUTION_PROVIDERS[options.accelerator]],
      graphOptimizationLevel: "all",
    };

    let source = model;
    if (options.serialization) {
      if (options.serialization.cachedModel) {
        source = options.serialization.cachedModel;
        sessionOptions.graphOptimizationLevel = "disabled";
      } else {
        sessionOptions.optimizedModelFilePath = options.serialization.optimizedModelPath;
      }
    }

    const session = await ort.InferenceSession.create(source, sessionOptions);
    return new OnnxModelSession(session, options.accelerator, this.options.inputDims, this.options.outputDims);
  }
}

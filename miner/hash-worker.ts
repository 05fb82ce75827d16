import { parentPort, workerData } from "worker_threads";
import { searchStripe, StripeJob } from "./pow-hash";

interface WorkerInput {
  job: StripeJob;
  control: SharedArrayBuffer;
}

function isWorkerInput(value: unknown): value is WorkerInput {
  return (
    typeof value === "object" &&
    value !== null &&
    "job" in value &&
    "control" in value &&
    value.control instanceof SharedArrayBuffer
  );
}

if (!parentPort) {
  throw new Error("hash-worker must run inside a worker thread");
}

if (!isWorkerInput(workerData)) {
  throw new Error("hash-worker started without a stripe job");
}

const { job, control } = workerData;

// Buffers arrive as plain Uint8Arrays after structured cloning
const result = searchStripe(
  { ...job, challenge: Buffer.from(job.challenge), minerPubkey: Buffer.from(job.minerPubkey) },
  new Int32Array(control)
);

parentPort.postMessage(result);

export { summarise } from "./summary.js";
export { serialiseDiagnostics, digestTable, sha256Hex } from "./serialise.js";

import { PYTHON_VAR } from "../packages/core/src/provision/config.js";
import {
  defaultPythonCommand,
  detectHostProfile,
  probeHost,
  toOsLabel,
} from "../packages/core/src/provision/host-probe.js";

const probe = probeHost();
console.log("=== HOST PROFILE ===");
if (!probe.ok) {
  throw new Error(`FAIL: ${probe.error.message} ${probe.error.suggestion}`);
}

const python = process.env[PYTHON_VAR]?.trim() || defaultPythonCommand(probe.osFamily);
const profile = await detectHostProfile(probe.osFamily, python);
console.log(`OS family:   ${toOsLabel(profile.osFamily)}`);
console.log(`Interpreter: ${python}`);
console.log(`Runtime tag: ${profile.runtimeTag}`);

console.log("✅ Host probe PASSED");

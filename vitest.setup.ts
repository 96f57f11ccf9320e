import fs from "node:fs";
import path from "node:path";

// Keep settings and the artifact index inside the workspace so tests never
// touch the real ~/.playsmith.
const testHome = path.resolve(process.cwd(), ".tmp", "playsmith-test-home");
fs.mkdirSync(testHome, { recursive: true });
process.env.PLAYSMITH_HOME = testHome;

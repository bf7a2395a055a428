export { optimizeCommand } from "./optimize.js";
export { enforceCommand } from "./enforce.js";
export { evaluateCommand } from "./evaluate.js";
export { verifyCommand } from "./verify.js";
export { checkCommand } from "./check.js";

export {
    parseMachineCatalog,
    loadMachineCatalog,
    selectMachines,
    pickFeasibleMachines,
    buildProblem,
    machineIdFor,
} from "./machines.js";
export type { MachineSelection, FeasibleSelection } from "./machines.js";

export { SimulatedFleet, createSimulatedFleet } from "./simulated-fleet.js";
export type {
  DeviceFault,
  SimulatedDeviceSeed,
  SimulatedFleetOptions,
  SimulatedLinkState,
  SimulatedPortSeed,
  SimulatedPortState,
} from "./simulated-fleet.js";

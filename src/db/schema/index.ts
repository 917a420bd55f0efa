export { fleetMembers } from "./fleet-members.js";
export { fleets } from "./fleets.js";
export { launchTemplates } from "./launch-templates.js";
export { refreshRuns } from "./refresh-runs.js";

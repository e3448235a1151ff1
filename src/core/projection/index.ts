export { projectPoints, projectWithDefinition } from "./project.js";
export type { ProjectionResult } from "./project.js";
export {
  resolveProjectionDefinition,
  resolveUtmZone,
  toProj4String,
  utmCentralMeridian,
  utmDefinition,
  utmZoneForLongitude
} from "./definition.js";
export type { UtmZone } from "./definition.js";

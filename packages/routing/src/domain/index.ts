export { RoadNetwork } from "./road-network.js";

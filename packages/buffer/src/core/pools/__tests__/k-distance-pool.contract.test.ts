import { KDistancePool } from "../k-distance-pool"
import { runVictimPoolContractTests } from "./victim-pool.contract"

describe("KDistancePool", () => {
  runVictimPoolContractTests("KDistancePool", () => new KDistancePool())
})

import { ENVIRONMENT_CONFIG } from "../config";
import type { EnvironmentalConditions } from "./types";

export const defaultEnvironmentalConditions = (): EnvironmentalConditions => ({
  weather: [...ENVIRONMENT_CONFIG.weather],
  tickLengthMinutes: ENVIRONMENT_CONFIG.tickLengthMinutes,
  initialHour: ENVIRONMENT_CONFIG.initialHour
});

import { STATISTICS_CONFIG, type GasAmiConversion } from "@/config";

/**
 * Converts a gas AMI quantity into the gas series' volume unit
 */
export interface GasConversion {
  name: GasAmiConversion;
  convert(quantity: number): number;
}

// 1 therm = 1.038 CCF
export const THERM_TO_CCF = 1.038;

// Feed already reports CCF
export const identityGasConversion: GasConversion = {
  name: "none",
  convert: (quantity) => quantity,
};

export const thermsToCcfConversion: GasConversion = {
  name: "therms_to_ccf",
  convert: (quantity) => quantity * THERM_TO_CCF,
};

export function getGasConversion(
  name: GasAmiConversion = STATISTICS_CONFIG.gasAmiConversion,
): GasConversion {
  return name === "therms_to_ccf"
    ? thermsToCcfConversion
    : identityGasConversion;
}

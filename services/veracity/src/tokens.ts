export const APP_CONFIG = Symbol("APP_CONFIG");
export const VERACITY_CACHE = Symbol("VERACITY_CACHE");
export const PROVENANCE_CHECKER = Symbol("PROVENANCE_CHECKER");
export const REPRODUCIBILITY_CHECKER = Symbol("REPRODUCIBILITY_CHECKER");

/** Injection token carrying the raw `HiveModuleOptions`. */
export const HIVE_OPTIONS = Symbol('HIVE_OPTIONS');

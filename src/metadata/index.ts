export * from "./csvWriter";
export * from "./harvester";
export * from "./parquetFooter";

import * as v from "valibot";

export const logLevelSchema = v.picklist(["debug", "info", "warn", "error"]);

export const logFormatSchema = v.picklist(["json", "pretty"]);

export type LogLevel = v.InferOutput<typeof logLevelSchema>;

export type LogFormat = v.InferOutput<typeof logFormatSchema>;

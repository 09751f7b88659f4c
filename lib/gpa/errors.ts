import type { GpaAnomaly } from "@/lib/gpa/types";

export class GpaConfigError extends Error {
  code: string;
  field: string | null;

  constructor(input: { message: string; code?: string; field?: string | null }) {
    super(input.message);
    this.name = "GpaConfigError";
    this.code = input.code || "GPA_CONFIG_INVALID";
    this.field = input.field || null;
  }
}

export class GpaBatchError extends Error {
  code: "NO_VALID_INPUT";
  anomalies: GpaAnomaly[];

  constructor(input: { message: string; anomalies: GpaAnomaly[] }) {
    super(input.message);
    this.name = "GpaBatchError";
    this.code = "NO_VALID_INPUT";
    this.anomalies = input.anomalies;
  }
}

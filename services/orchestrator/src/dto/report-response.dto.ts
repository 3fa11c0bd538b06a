import type { DecisionRecord } from "../types.js";

export class ReportResponseDto {
  id!: string;
  storedAt!: string;
  decision!: DecisionRecord;
}

export class ReportListResponseDto {
  items!: ReportResponseDto[];
}

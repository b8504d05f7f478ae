// core/excel_writer.ts

import { Workbook } from "exceljs";
import { ReportRow } from "../types/tags";
import { REPORT_COLUMNS } from "./record_assembler";

/**
 * ReportWriter: turns the flattened rows into one output file.
 */
export interface ReportWriter {
  write(rows: ReportRow[], outputPath: string): Promise<void>;
}

const COLUMN_WIDTH = 30;
const HEADER_FILL = "FFD3D3D3";

/**
 * ExcelReportWriter: writes a single worksheet with a bold, grey header row,
 * fixed-width columns and wrapped text so multiline steps stay readable.
 */
export class ExcelReportWriter implements ReportWriter {
  constructor(private readonly sheetName = "Test Cases") {}

  async write(rows: ReportRow[], outputPath: string): Promise<void> {
    const workbook = new Workbook();
    const sheet = workbook.addWorksheet(this.sheetName, {
      views: [{ state: "frozen", ySplit: 1 }],
    });

    sheet.columns = REPORT_COLUMNS.map((column) => ({
      header: column.header,
      key: column.key,
      width: COLUMN_WIDTH,
    }));
    sheet.addRows(rows);

    const header = sheet.getRow(1);
    header.font = { bold: true };
    header.eachCell((cell) => {
      cell.fill = { type: "pattern", pattern: "solid", fgColor: { argb: HEADER_FILL } };
    });

    sheet.eachRow((row) => {
      row.eachCell({ includeEmpty: true }, (cell) => {
        cell.alignment = { wrapText: true, vertical: "top" };
      });
    });

    await workbook.xlsx.writeFile(outputPath);
  }
}

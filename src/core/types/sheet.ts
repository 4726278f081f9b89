// CHANGE: Raw spreadsheet cell and row types shared by SHELL reader and CORE loader
// PURITY: CORE

/**
 * Value of a single cell as the workbook reader hands it over.
 */
export type CellValue = string | number | boolean | Date | null | undefined;

export type RawRow = readonly CellValue[];

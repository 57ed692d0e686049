export {
  type CellValue,
  type Row,
  type Table,
  TableSchema,
  isBlank,
  cellsEqual,
  cloneTable,
  tablesEqual,
  rowKeyOf,
  displayRowKey,
} from "./table.js";

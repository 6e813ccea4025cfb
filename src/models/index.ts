export * from "./Logger";
export { LogPrinter } from "./LogPrinter";
export type {
  PrintableLog,
  ColorTheme,
  LogWriter,
  PrintStrategy as LogPrinterPrintStrategy,
} from "./LogPrinter";

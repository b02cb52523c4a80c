export {
  CsvDataLoader,
  type CsvColumns,
  type CsvDataLoaderOptions,
  type DataLoader,
} from "./data-loader.js";

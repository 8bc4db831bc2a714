import { describe, it, expect } from "vitest";
import * as XLSX from "xlsx";
import { validateRecords } from "../aggregate.js";
import { buildExportRows, exportRowsToCsv, exportRowsToXlsx } from "../export.js";
import { NOW, validWith } from "./fixtures.js";

const records = [
  validWith({ title: "Cap, wool", link: "http://shop.example.com/p/cap" }),
  validWith({ price: null, availability: "sold", inventory_quantity: 5 }),
];
const rows = buildExportRows(records, validateRecords(records, { now: NOW }));

describe("buildExportRows", () => {
  it("flattens each evaluated record with its messages", () => {
    expect(rows).toEqual([
      {
        index: 1,
        id: "SKU-1",
        title: "Cap, wool",
        price: "79.99 USD",
        availability: "in_stock",
        inventory_quantity: "12",
        errors: "",
        warnings: "link should use HTTPS",
      },
      {
        index: 2,
        id: "SKU-1",
        title: "Trail Runner",
        price: "",
        availability: "sold",
        inventory_quantity: "5",
        errors:
          "Missing required field: price | availability must be one of 'in_stock', 'out_of_stock', 'preorder'",
        warnings: "",
      },
    ]);
  });
});

describe("exportRowsToCsv", () => {
  it("writes a header and quotes values containing commas", () => {
    expect(exportRowsToCsv(rows).split("\n")).toEqual([
      "index,id,title,price,availability,inventory_quantity,errors,warnings",
      '1,SKU-1,"Cap, wool",79.99 USD,in_stock,12,,link should use HTTPS',
      "2,SKU-1,Trail Runner,,sold,5,\"Missing required field: price | availability must be one of 'in_stock', 'out_of_stock', 'preorder'\",",
    ]);
  });

  it("writes only the header for an empty export", () => {
    expect(exportRowsToCsv([])).toBe("index,id,title,price,availability,inventory_quantity,errors,warnings");
  });
});

describe("exportRowsToXlsx", () => {
  it("writes a workbook that reads back with the same values", () => {
    const workbook = XLSX.read(exportRowsToXlsx(rows), { type: "array" });
    expect(workbook.SheetNames).toEqual(["Validation"]);
    const sheet = workbook.Sheets.Validation;
    expect(sheet.A1?.v).toBe("index");
    expect(sheet.A2?.v).toBe(1);
    expect(sheet.C2?.v).toBe("Cap, wool");
    expect(sheet.H2?.v).toBe("link should use HTTPS");
    expect(sheet.E3?.v).toBe("sold");
  });
});

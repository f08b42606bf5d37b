import { describe, it, expect } from "vitest";
import { readFileSync } from "fs";
import { resolve } from "path";
import { parseSupplierHtml, padAudits } from "../services/extractorService";
import { createLogger } from "../utils/logger";

const SCORECARD_HTML = readFileSync(resolve(__dirname, "fixtures/supplier-23629.html"), "utf-8");
const SPARSE_HTML = readFileSync(resolve(__dirname, "fixtures/supplier-10457.html"), "utf-8");

const logger = createLogger({ sink: () => {} });
const now = new Date(2025, 0, 15);

describe("parseSupplierHtml with a complete scorecard page", () => {
  const record = parseSupplierHtml(SCORECARD_HTML, { now, logger });

  it("splits the supplier link into id and name", () => {
    expect(record.id).toBe("23629");
    expect(record.parmaId).toBe("23629");
    expect(record.name).toBe("Nordic Gear Components AB");
    expect(record.logo).toBe("NO");
  });

  it("fills the display placeholders", () => {
    expect(record.address).toBe("N/A");
    expect(record.projectLink).toBe("#");
    expect(record.timeplanLink).toBe("#");
    expect(record.apqp).toBe("N/A");
    expect(record.ppap).toBe("N/A");
  });

  it("reads the three quality indices from the audit panel", () => {
    expect(record.metrics.sma).toBe("74%");
    expect(record.metrics.smaStatus).toBe("Approved");
    expect(record.metrics.smaDate).toBe("2017-03-17");
    expect(record.metrics.swIndex).toBe("81%");
    expect(record.metrics.swStatus).toBe("Approved");
    expect(record.metrics.swDate).toBe("2016-12-01");
    expect(record.metrics.eeIndex).toBe("69%");
    expect(record.metrics.eeStatus).toBe("Approved with conditions (Restriction)");
    expect(record.metrics.eeDate).toBe("2017-03-29");
  });

  it("keeps the legacy 'sw Date' key as a placeholder", () => {
    expect(record.metrics["sw Date"]).toBe("N/A");
  });

  it("copies the CSR assessment into the metrics", () => {
    expect(record.metrics.csr).toBe("75%");
    expect(record.metrics.csrStatus).toBe("Pending");
    expect(record.metrics.csrDate).toBe("2024-06-30");
    expect(record.metrics.saq).toBe("N/A");
  });

  it("lists the audits in scorecard order", () => {
    expect(record.audits).toEqual([
      { title: "SEM", status: "Approved 87%", statusClass: "status-approved", date: "2024-05-14" },
      { title: "Quality Cert", status: "Approved", statusClass: "status-approved", date: "Exp: 2099-01-31" },
      { title: "ISO 14001", status: "Expired", statusClass: "status-expired", date: "Exp: 2020-01-01" },
      { title: "Logistic", status: "B 85%", statusClass: "status-approved", date: "2023-09-12" },
      { title: "REACH", status: "Compliant", statusClass: "status-approved", date: "Eval: 2024-02-20" },
      { title: "CSR", status: "75%", statusClass: "status-pending", date: "Eval: 2024-06-30" }
    ]);
  });

  it("builds labelled synthetic series ending on the supplier total", () => {
    expect(record.qpm.synthetic).toBe(true);
    expect(record.qpm.actual).toBe(12);
    expect(record.qpm.months).toHaveLength(12);
    expect(record.qpm.values).toHaveLength(12);
    expect(record.qpm.values[11]).toBe(12);

    expect(record.ppm.synthetic).toBe(true);
    expect(record.ppm.actual).toBe(25);
    expect(record.ppm.values[11]).toBe(25);
  });

  it("produces the same record for the same page", () => {
    expect(parseSupplierHtml(SCORECARD_HTML, { now, logger })).toEqual(record);
  });
});

describe("parseSupplierHtml with a sparse page", () => {
  const record = parseSupplierHtml(SPARSE_HTML, { now, logger });

  it("trims id and name", () => {
    expect(record.id).toBe("10457");
    expect(record.name).toBe("Baltic Fasteners Oy");
    expect(record.logo).toBe("BA");
  });

  it("leaves all nine quality index fields as placeholders", () => {
    const { sma, smaStatus, smaDate, swIndex, swStatus, swDate, eeIndex, eeStatus, eeDate } =
      record.metrics;
    expect([sma, smaStatus, smaDate, swIndex, swStatus, swDate, eeIndex, eeStatus, eeDate]).toEqual(
      Array.from({ length: 9 }, () => "N/A")
    );
  });

  it("pads the audits to six with the real entry first", () => {
    expect(record.audits).toHaveLength(6);
    expect(record.audits[0]).toEqual({
      title: "Logistic",
      status: "C 55%",
      statusClass: "status-not-approved",
      date: "2022-11-03"
    });
    for (const pad of record.audits.slice(1)) {
      expect(pad).toEqual({ title: "N/A", status: "N/A", statusClass: "status-na", date: "N/A" });
    }
  });

  it("has empty, non-synthetic series without a performance table", () => {
    expect(record.qpm).toEqual({ months: [], values: [], actual: null, synthetic: false });
    expect(record.ppm).toEqual({ months: [], values: [], actual: null, synthetic: false });
  });
});

describe("parseSupplierHtml with unexpected input", () => {
  it("uses placeholders when there is no supplier link", () => {
    const record = parseSupplierHtml("<html><body><p>nothing here</p></body></html>", {
      now,
      logger
    });
    expect(record.id).toBe("N/A");
    expect(record.name).toBe("Unknown");
    expect(record.logo).toBe("??");
    expect(record.audits).toHaveLength(6);
  });

  it("uses placeholders when the link text has no comma", () => {
    const record = parseSupplierHtml(
      '<a href="SupplierInformation.aspx?SupplierId=1">Nordic Gear</a>',
      { now, logger }
    );
    expect(record.id).toBe("N/A");
    expect(record.name).toBe("Unknown");
  });

  it("does not throw on an empty document", () => {
    expect(() => parseSupplierHtml("", { now, logger })).not.toThrow();
  });
});

describe("padAudits", () => {
  it("keeps more than six entries as they are", () => {
    const entry = { title: "CSR", status: "90%", statusClass: "status-approved" as const, date: "N/A" };
    expect(padAudits(Array.from({ length: 7 }, () => entry))).toHaveLength(7);
  });
});

import { describe, it, expect, vi } from "vitest";
import * as cheerio from "cheerio";
import {
  CERTIFICATION_RULES,
  certificateStatus,
  csrClassification,
  isExpired,
  logisticStatusClass,
  parseCertificationAudits,
  parseSemAudit,
  type CertificationRule
} from "../services/certificationRules";
import type { Logger } from "../utils/logger";

const now = new Date(2025, 0, 15);

function silentLogger(): Logger {
  return { info: vi.fn(), warn: vi.fn(), error: vi.fn() };
}

function ratingsPage(rows: [string, string[]][]): string {
  const body = rows
    .map(
      ([label, cells]) =>
        `<tr><td><strong>${label}</strong></td>${cells
          .map((c) => `<td><div class="SSColorRating">${c}</div></td>`)
          .join("")}</tr>`
    )
    .join("");
  return `<table>${body}</table>`;
}

describe("certificateStatus", () => {
  it("overrides the approval keyword once the certificate has expired", () => {
    for (const text of [
      "IATF 16949 Approved Expire: 2020-01-01",
      "ISO 9001 Not approved Expire: 2020-01-01",
      "ISO 9001 Expire: 2020-01-01"
    ]) {
      expect(certificateStatus(text, now)).toEqual({
        status: "Expired",
        statusClass: "status-expired",
        expires: "2020-01-01"
      });
    }
  });

  it("keeps the keyword while the certificate is valid", () => {
    expect(certificateStatus("ISO 9001 Not approved Expire: 2030-06-30", now).status).toBe(
      "Not Approved"
    );
    expect(certificateStatus("ISO 9001 Expire: 2030-06-30", now).status).toBe("Approved");
  });

  it("treats a certificate without expiry as valid", () => {
    expect(certificateStatus("IATF 16949", now)).toEqual({
      status: "Approved",
      statusClass: "status-approved",
      expires: null
    });
  });
});

describe("isExpired", () => {
  it("compares against the start of the expiry day", () => {
    expect(isExpired("2025-01-14", now)).toBe(true);
    expect(isExpired("2025-01-15", now)).toBe(false);
    expect(isExpired("2025-01-16", now)).toBe(false);
  });
});

describe("logistic and CSR classification", () => {
  it("maps grades to tiers", () => {
    expect(logisticStatusClass("A")).toBe("status-excellent");
    expect(logisticStatusClass("B")).toBe("status-approved");
    expect(logisticStatusClass("C")).toBe("status-not-approved");
  });

  it("thresholds CSR at 80% and 60%", () => {
    expect(csrClassification(85)).toEqual({ status: "Approved", statusClass: "status-approved" });
    expect(csrClassification(80).status).toBe("Approved");
    expect(csrClassification(75)).toEqual({ status: "Pending", statusClass: "status-pending" });
    expect(csrClassification(60).status).toBe("Pending");
    expect(csrClassification(40)).toEqual({
      status: "Not Approved",
      statusClass: "status-not-approved"
    });
  });
});

describe("parseCertificationAudits", () => {
  it("classifies a 'B 85%' logistic cell as approved", () => {
    const $ = cheerio.load(ratingsPage([["Logistic Audit:", ["B 85% (2023-09-12)"]]]));
    const { audits } = parseCertificationAudits($, now, silentLogger());
    expect(audits).toEqual([
      { title: "Logistic", status: "B 85%", statusClass: "status-approved", date: "2023-09-12" }
    ]);
  });

  it("reports CSR metrics for each threshold band", () => {
    const expected: [string, string][] = [
      ["85%", "Approved"],
      ["75%", "Pending"],
      ["40%", "Not Approved"]
    ];
    for (const [percent, status] of expected) {
      const $ = cheerio.load(
        ratingsPage([["Sustainability Self-Assessment:", [`${percent} Evaluated: 2024-03-01`]]])
      );
      const { csr } = parseCertificationAudits($, now, silentLogger());
      expect(csr).toEqual({ csr: percent, csrStatus: status, csrDate: "2024-03-01" });
    }
  });

  it("skips cells that the rule does not accept", () => {
    const $ = cheerio.load(
      ratingsPage([
        ["Environmental Certification:", ["N/A", "ISO 14001 Expire: 2031-01-01"]],
        ["REACH EU Compliance:", ["Not evaluated"]]
      ])
    );
    const { audits, csr } = parseCertificationAudits($, now, silentLogger());
    expect(audits).toEqual([
      { title: "ISO 14001", status: "Approved", statusClass: "status-approved", date: "Exp: 2031-01-01" }
    ]);
    expect(csr).toBeNull();
  });

  it("logs and skips a cell whose rule throws", () => {
    const logger = silentLogger();
    const failing: CertificationRule = {
      title: "Broken",
      label: "Logistic Audit:",
      classify: () => {
        throw new Error("bad cell");
      }
    };
    const $ = cheerio.load(ratingsPage([["Logistic Audit:", ["A 99% (2024-01-01)"]]]));
    const { audits } = parseCertificationAudits($, now, logger, [failing, ...CERTIFICATION_RULES]);
    expect(audits).toEqual([
      { title: "Logistic", status: "A 99%", statusClass: "status-excellent", date: "2024-01-01" }
    ]);
    expect(logger.warn).toHaveBeenCalledWith(
      'Skipping Broken cell "A 99% (2024-01-01)": Error: bad cell'
    );
  });

  it("only matches a label with the exact text", () => {
    const $ = cheerio.load(ratingsPage([["Logistic Audit (old):", ["A 99% (2024-01-01)"]]]));
    expect(parseCertificationAudits($, now, silentLogger()).audits).toEqual([]);
  });
});

describe("parseSemAudit", () => {
  it("prefers the negative keyword and flags stopping parameters", () => {
    const $ = cheerio.load(
      '<div id="SEMPanelFollowup"><b>Not approved</b><i>42%</i><i>StoppingParameter</i><i>2023-10-10</i></div>'
    );
    expect(parseSemAudit($)).toEqual({
      title: "SEM",
      status: "Not Approved (Stopping) 42%",
      statusClass: "status-not-approved",
      date: "2023-10-10"
    });
  });

  it("falls back to Unknown without a keyword", () => {
    const $ = cheerio.load('<div id="SEMPanelFollowup">No assessment</div>');
    expect(parseSemAudit($)).toEqual({
      title: "SEM",
      status: "Unknown N/A",
      statusClass: "status-na",
      date: "N/A"
    });
  });

  it("returns null without the panel", () => {
    expect(parseSemAudit(cheerio.load("<p></p>"))).toBeNull();
  });
});

/**
 * Property-based tests for engine invariants.
 */

import { describe, it, expect } from "vitest";
import fc from "fast-check";
import {
  buildRuleIndex,
  loadRuleTable,
  lookupCandidates,
  normalizeKey,
  sortRulesForDisplay,
} from "../../../src/services/rule-table.js";
import { evaluateMessage, evaluateMessages } from "../../../src/services/evaluator.js";
import { applyOutcomes, resetStatuses } from "../../../src/services/result-sync.js";
import { matchesWildcard } from "../../../src/services/wildcard.js";
import { silentLogger } from "../../../src/services/logger.js";
import type { AttachmentWriter } from "../../../src/storage/archive-writer.js";
import {
  HEADERS,
  arbFilename,
  arbMessage,
  arbOutcomes,
  arbRawTable,
  arbSender,
  arbSubject,
} from "./generators.js";

const nullWriter: AttachmentWriter = (dir, saveName) => `${dir}/${saveName}`;

describe("Row identity", () => {
  it("rowIndex equals the original position", () => {
    fc.assert(
      fc.property(arbRawTable, (raw) => {
        const table = loadRuleTable(raw);
        table.rules.forEach((rule, position) => {
          expect(rule.rowIndex).toBe(position);
        });
      })
    );
  });

  it("rowIndex still points at the source row after re-sorting", () => {
    fc.assert(
      fc.property(arbRawTable, (raw) => {
        const sorted = sortRulesForDisplay(loadRuleTable(raw), (a, b) =>
          a.attachmentPattern.localeCompare(b.attachmentPattern)
        );
        for (const rule of sorted.rules) {
          const source = raw.rows[rule.rowIndex];
          expect(rule.senderKey).toBe(normalizeKey(source?.[0]));
          expect(rule.saveName).toBe(String(source?.[3]).trim());
        }
      })
    );
  });
});

describe("Rule index lookup", () => {
  it("returns no candidates for pairs absent from the table", () => {
    fc.assert(
      fc.property(arbRawTable, arbSender, arbSubject, (raw, sender, subject) => {
        const index = buildRuleIndex(loadRuleTable(raw));
        expect(lookupCandidates(index, `absent-${sender}`, subject)).toEqual([]);
      })
    );
  });

  it("finds exactly the rows whose normalized keys match", () => {
    fc.assert(
      fc.property(arbRawTable, arbSender, arbSubject, (raw, sender, subject) => {
        const table = loadRuleTable(raw);
        const expected = table.rules
          .filter((r) => r.senderKey === normalizeKey(sender) && r.subjectKey === normalizeKey(subject))
          .map((r) => r.rowIndex);
        const found = lookupCandidates(buildRuleIndex(table), sender, subject).map((r) => r.rowIndex);
        expect(found).toEqual(expected);
      })
    );
  });
});

describe("Wildcard case folding", () => {
  it("a name always matches its own other-cased form", () => {
    fc.assert(
      fc.property(arbFilename, (name) => {
        expect(matchesWildcard(name.toUpperCase(), name.toLowerCase())).toBe(true);
        expect(matchesWildcard(name.toLowerCase(), name.toUpperCase())).toBe(true);
      })
    );
  });
});

describe("Evaluation", () => {
  it("an attachment matching N overlapping patterns yields N outcomes and N writes", () => {
    fc.assert(
      fc.property(fc.integer({ min: 1, max: 6 }), arbFilename, (n, filename) => {
        const rows = Array.from({ length: n }, (_, i) => ["a@x.com", "Report", "*", `copy-${i}.bin`, null]);
        const index = buildRuleIndex(loadRuleTable({ headers: HEADERS, rows }));
        let writes = 0;
        const writer: AttachmentWriter = (dir, saveName) => {
          writes += 1;
          return `${dir}/${saveName}`;
        };

        const result = evaluateMessage(
          { sender: "a@x.com", subject: "Report", attachments: [{ filename, content: Buffer.from("x") }] },
          0,
          index,
          { archiveDir: "/archive", writer, logger: silentLogger }
        );

        expect(result.outcomes).toHaveLength(n);
        expect(writes).toBe(n);
      })
    );
  });

  it("messages without attachments contribute nothing", () => {
    fc.assert(
      fc.property(arbRawTable, arbSender, arbSubject, (raw, sender, subject) => {
        const index = buildRuleIndex(loadRuleTable(raw));
        const result = evaluateMessage({ sender, subject, attachments: [] }, 0, index, {
          archiveDir: "/archive",
          writer: nullWriter,
          logger: silentLogger,
        });
        expect(result).toEqual({ outcomes: [], dispositions: [], failures: [] });
      })
    );
  });

  it("every outcome targets a candidate of its message's key", () => {
    fc.assert(
      fc.property(arbRawTable, fc.array(arbMessage, { maxLength: 5 }), (raw, messages) => {
        const table = loadRuleTable(raw);
        const result = evaluateMessages(messages, buildRuleIndex(table), {
          archiveDir: "/archive",
          writer: nullWriter,
          logger: silentLogger,
        });

        for (const outcome of result.outcomes) {
          const rule = table.rules[outcome.rowIndex];
          const message = messages[outcome.messageIndex];
          expect(rule?.senderKey).toBe(normalizeKey(message?.sender));
          expect(rule?.subjectKey).toBe(normalizeKey(message?.subject));
          expect(matchesWildcard(outcome.attachmentName, rule?.attachmentPattern ?? "")).toBe(true);
        }
        expect(result.failures).toEqual([]);
      })
    );
  });
});

describe("Synchronization", () => {
  it("applying the same outcomes twice equals applying them once", () => {
    fc.assert(
      fc.property(
        arbRawTable.chain((raw) => fc.tuple(fc.constant(raw), arbOutcomes(raw.rows.length))),
        ([raw, outcomes]) => {
          const table = loadRuleTable(raw);
          const once = applyOutcomes(table, outcomes, silentLogger);
          const twice = applyOutcomes(once, outcomes, silentLogger);
          expect(JSON.stringify(twice)).toBe(JSON.stringify(once));
        }
      )
    );
  });

  it("reset leaves no status behind", () => {
    fc.assert(
      fc.property(arbRawTable, (raw) => {
        const reset = resetStatuses(loadRuleTable(raw));
        expect(reset.rules.every((rule) => rule.status === undefined)).toBe(true);
        expect(reset.rules).toHaveLength(raw.rows.length);
      })
    );
  });
});

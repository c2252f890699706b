import assert from "assert";
import { describe, it } from "node:test";
import { buildCatalog } from "../core/catalog";
import { DropTally } from "../core/dropTally";
import { extractIntelligence, joinMessages } from "../core/extractor";
import { scanType } from "../core/scanner";
import { emptyIntelligence } from "../utils/types";

describe("extractIntelligence", () => {
  it("returns an empty record for empty or non-string input", () => {
    assert.deepEqual(extractIntelligence(""), emptyIntelligence());
    assert.deepEqual(extractIntelligence("   "), emptyIntelligence());
    assert.deepEqual(extractIntelligence([]), emptyIntelligence());
  });

  it("takes a known-provider handle as a UPI id", () => {
    const result = extractIntelligence("pay to scammer@ybl");
    assert.deepEqual(result.upiIds, ["scammer@ybl"]);
    assert.deepEqual(result.emails, []);
    assert.deepEqual(result.beneficiaryNames, []);
  });

  it("keeps a dotted-domain address out of UPI ids and links", () => {
    const result = extractIntelligence("contact me at scammer@gmail.com");
    assert.deepEqual(result.upiIds, []);
    assert.deepEqual(result.emails, ["scammer@gmail.com"]);
    assert.deepEqual(result.phishingLinks, []);
  });

  it("reads a bare mobile number as a phone, never an account", () => {
    const result = extractIntelligence("9876543210");
    assert.deepEqual(result.phoneNumbers, ["9876543210"]);
    assert.deepEqual(result.bankAccounts, []);
  });

  it("reads a 0-prefixed mobile number as a phone, never an account", () => {
    const tally = new DropTally();
    const result = extractIntelligence("call 09876543210 now", { tally });
    assert.deepEqual(result.phoneNumbers, ["9876543210"]);
    assert.deepEqual(result.bankAccounts, []);
    assert.equal(tally.snapshot().bankAccounts?.["pattern:phone_shaped"], 1);
  });

  it("keeps an address on a bank's mail domain", () => {
    const result = extractIntelligence("Email your KYC documents to kyc.help@sbi.co.in today");
    assert.deepEqual(result.emails, ["kyc.help@sbi.co.in"]);
    assert.deepEqual(result.upiIds, []);
    assert.deepEqual(result.phishingLinks, []);
  });

  it("does not read words joined by a missing space as domains", () => {
    const tally = new DropTally();
    const result = extractIntelligence("from the bank.Please update your account.Verify now", { tally });
    assert.deepEqual(result.phishingLinks, []);
    assert.deepEqual(tally.snapshot().phishingLinks, { "pattern:unknown_tld": 2 });
  });

  it("does not report the provider of a handle as a link", () => {
    const result = extractIntelligence("send to rahul@paytm for details");
    assert.deepEqual(result.upiIds, ["rahul@paytm"]);
    assert.deepEqual(result.phishingLinks, []);
  });

  it("keeps phones and accounts disjoint", () => {
    const result = extractIntelligence("Call 9876543210, account 123456789012");
    assert.deepEqual(result.phoneNumbers, ["9876543210"]);
    assert.deepEqual(result.bankAccounts, ["123456789012"]);
    const overlap = result.phoneNumbers.filter((p) => result.bankAccounts.includes(p));
    assert.deepEqual(overlap, []);
  });

  it("reads a hyphenated account without finding a phone inside it", () => {
    const result = extractIntelligence("A/C No: 1234-5678-9012-3456");
    assert.deepEqual(result.bankAccounts, ["1234567890123456"]);
    assert.deepEqual(result.phoneNumbers, []);
  });

  it("converts spelled-out digits to a phone number", () => {
    const result = extractIntelligence("call nine eight seven six five four three two one zero");
    assert.deepEqual(result.phoneNumbers, ["9876543210"]);
    assert.deepEqual(result.bankAccounts, []);
  });

  it("folds a spaced IFSC into one code", () => {
    const result = extractIntelligence("IFSC code is SBIN 0001 234");
    assert.deepEqual(result.ifscCodes, ["SBIN0001234"]);
  });

  it("accepts a plain IFSC and ignores one with a bad fifth character", () => {
    assert.deepEqual(extractIntelligence("use SBIN0001234").ifscCodes, ["SBIN0001234"]);
    assert.deepEqual(extractIntelligence("use ABCD1234567").ifscCodes, []);
  });

  it("trims trailing punctuation off protocol links and does not double count them", () => {
    const result = extractIntelligence("Verify now at http://secure-kyc.example.com/login.");
    assert.deepEqual(result.phishingLinks, ["http://secure-kyc.example.com/login"]);
  });

  it("keeps suspicious bare domains and drops file names", () => {
    assert.deepEqual(extractIntelligence("open sbi-kyc-update.in now").phishingLinks, ["sbi-kyc-update.in"]);
    assert.deepEqual(extractIntelligence("open sbi-kyc-update.in now").bankNames, []);
    assert.deepEqual(extractIntelligence("see report.pdf").phishingLinks, []);
  });

  it("finds beneficiary names behind trigger phrases", () => {
    assert.deepEqual(extractIntelligence("Beneficiary name is Rahul Sharma").beneficiaryNames, ["Rahul Sharma"]);
    assert.deepEqual(extractIntelligence("Mera naam Suresh hai").beneficiaryNames, ["Suresh"]);
  });

  it("skips a leading honorific in a beneficiary name", () => {
    assert.deepEqual(extractIntelligence("Account holder: Mr. Rahul Sharma").beneficiaryNames, ["Rahul Sharma"]);
    assert.deepEqual(extractIntelligence("Beneficiary name: Mr Rahul Sharma").beneficiaryNames, ["Rahul Sharma"]);
    assert.deepEqual(extractIntelligence("My name is Mr. Rahul Sharma").beneficiaryNames, ["Rahul Sharma"]);
    assert.deepEqual(extractIntelligence("Beneficiary: Mrs Mr").beneficiaryNames, []);
  });

  it("places a name capture at its own position, not at an earlier copy inside the trigger", () => {
    assert.deepEqual(extractIntelligence("Beneficiary: Ben@ybl").beneficiaryNames, []);
    assert.deepEqual(extractIntelligence("Beneficiary: Ben@ybl").upiIds, ["ben@ybl"]);
  });

  it("reads WhatsApp numbers only from WhatsApp context", () => {
    const labeled = extractIntelligence("WhatsApp number: 98765 43210");
    assert.deepEqual(labeled.whatsappNumbers, ["9876543210"]);
    assert.deepEqual(extractIntelligence("https://wa.me/919876543210").whatsappNumbers, ["9876543210"]);
    assert.deepEqual(extractIntelligence("Call 9876543210").whatsappNumbers, []);
  });

  it("maps bank names to their gazetteer form", () => {
    const result = extractIntelligence("Deposit in State Bank of India branch");
    assert.deepEqual(result.bankNames, ["State Bank of India"]);
  });

  it("tallies rejected pattern candidates by reason", () => {
    const tally = new DropTally();
    const result = extractIntelligence("UPI ID: fraud@unknownbank", { tally });
    assert.deepEqual(result.upiIds, []);
    assert.equal(tally.snapshot().upiIds?.["pattern:unknown_provider"], 1);
  });

  it("accepts extra providers from a custom catalog", () => {
    const catalog = buildCatalog({ extraUpiProviders: ["NewPay"] });
    assert.deepEqual(extractIntelligence("send to x1@newpay", { catalog }).upiIds, ["x1@newpay"]);
    assert.deepEqual(extractIntelligence("send to x1@newpay").upiIds, []);
  });

  it("joins message lists without merging across messages", () => {
    assert.equal(joinMessages(["a", "", "b"]), "a \n b");
    const result = extractIntelligence(["Call 9876543210", "pay to scammer@ybl"]);
    assert.deepEqual(result.phoneNumbers, ["9876543210"]);
    assert.deepEqual(result.upiIds, ["scammer@ybl"]);
  });
});

describe("scanType", () => {
  it("reports the span of the captured value", () => {
    const holder = scanType("Beneficiary name is Rahul", "beneficiaryNames").filter((c) => c.pattern === "holder");
    assert.deepEqual(holder, [{ type: "beneficiaryNames", value: "Rahul", start: 20, end: 25, pattern: "holder" }]);
  });

  it("reports the whole match for patterns without a capture", () => {
    const [upi] = scanType("pay scammer@ybl", "upiIds");
    assert.equal(upi.start, 4);
    assert.equal(upi.end, 15);
  });
});

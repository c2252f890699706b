import assert from "assert";
import { describe, it } from "node:test";
import { checkAccountCollision } from "../core/collision";
import {
  looksLikePhone,
  validateBankAccount,
  validateBeneficiaryName,
  validateBankName,
  validateEmail,
  validateEntity,
  validateIfsc,
  validatePhishingLink,
  validatePhone,
  validateUpiId
} from "../core/validator";

describe("validators", () => {
  it("checks the Indian mobile shape", () => {
    assert.equal(looksLikePhone("9876543210"), true);
    assert.equal(looksLikePhone("919876543210"), true);
    assert.equal(looksLikePhone("5876543210"), false);
    assert.equal(looksLikePhone("09876543210"), true);
    assert.equal(looksLikePhone("05876543210"), false);
    assert.deepEqual(validatePhone("9876543210"), { ok: true });
    assert.deepEqual(validatePhone("987654321"), { ok: false, reason: "length" });
    assert.deepEqual(validatePhone("1234567890"), { ok: false, reason: "prefix" });
  });

  it("rejects phone-shaped and degenerate account numbers", () => {
    assert.deepEqual(validateBankAccount("123456789012"), { ok: true });
    assert.deepEqual(validateBankAccount("9876543210"), { ok: false, reason: "phone_shaped" });
    assert.deepEqual(validateBankAccount("919876543210"), { ok: false, reason: "phone_shaped" });
    assert.deepEqual(validateBankAccount("09876543210"), { ok: false, reason: "phone_shaped" });
    assert.deepEqual(validateBankAccount("11111111111"), { ok: false, reason: "repeated_digit" });
    assert.deepEqual(validateBankAccount("12345678"), { ok: false, reason: "length" });
  });

  it("requires an allow-listed UPI provider", () => {
    assert.deepEqual(validateUpiId("scammer@ybl"), { ok: true });
    assert.deepEqual(validateUpiId("scammer@gmail"), { ok: false, reason: "unknown_provider" });
    assert.deepEqual(validateUpiId("scammer@gmail.com"), { ok: false, reason: "shape" });
  });

  it("checks every IFSC position", () => {
    assert.deepEqual(validateIfsc("SBIN0001234"), { ok: true });
    assert.deepEqual(validateIfsc("ABCD1234567"), { ok: false, reason: "fifth_char" });
    assert.deepEqual(validateIfsc("SB1N0001234"), { ok: false, reason: "bank_code" });
    assert.deepEqual(validateIfsc("SBIN000123"), { ok: false, reason: "length" });
  });

  it("keeps UPI provider domains out of emails", () => {
    assert.deepEqual(validateEmail("scammer@gmail.com"), { ok: true });
    assert.deepEqual(validateEmail("fraud@ybl.com"), { ok: false, reason: "upi_provider_domain" });
    assert.deepEqual(validateEmail("fraud@okaxis.in"), { ok: false, reason: "upi_provider_domain" });
  });

  it("accepts mailboxes on bank domains that share a UPI handle code", () => {
    assert.deepEqual(validateEmail("kyc.help@sbi.co.in"), { ok: true });
    assert.deepEqual(validateEmail("care@icici.com"), { ok: true });
    assert.deepEqual(validateEmail("alerts@hdfcbank.net"), { ok: true });
  });

  it("needs a path or keyword on bare links", () => {
    assert.deepEqual(validatePhishingLink("https://example.com"), { ok: true });
    assert.deepEqual(validatePhishingLink("upi://pay?pa=x@ybl"), { ok: true });
    assert.deepEqual(validatePhishingLink("example.com/login"), { ok: true });
    assert.deepEqual(validatePhishingLink("secure-pay.in"), { ok: true });
    assert.deepEqual(validatePhishingLink("example.com"), { ok: false, reason: "no_path_or_keyword" });
    assert.deepEqual(validatePhishingLink("photo.jpg"), { ok: false, reason: "file_extension" });
  });

  it("needs a known TLD, a hyphen or www on a path-less bare domain", () => {
    assert.deepEqual(validatePhishingLink("bank.please"), { ok: false, reason: "unknown_tld" });
    assert.deepEqual(validatePhishingLink("account.verify"), { ok: false, reason: "unknown_tld" });
    assert.deepEqual(validatePhishingLink("kyc-bank.verify"), { ok: true });
    assert.deepEqual(validatePhishingLink("www.bank.verify"), { ok: true });
    assert.deepEqual(validatePhishingLink("bank.please/login"), { ok: true });
    assert.deepEqual(validatePhishingLink("kyc.xyz"), { ok: true });
  });

  it("rejects blocklisted and bank-like beneficiary names", () => {
    assert.deepEqual(validateBeneficiaryName("Rahul Sharma"), { ok: true });
    assert.deepEqual(validateBeneficiaryName("Support Team"), { ok: false, reason: "blocklisted" });
    assert.deepEqual(validateBeneficiaryName("State Bank"), { ok: false, reason: "bank_name" });
    assert.deepEqual(validateBeneficiaryName("R2D2"), { ok: false, reason: "characters" });
  });

  it("accepts only gazetteer bank names", () => {
    assert.deepEqual(validateBankName("HDFC"), { ok: true });
    assert.deepEqual(validateBankName("Fake Bank"), { ok: false, reason: "not_in_gazetteer" });
  });

  it("reports empty values before the type rule", () => {
    assert.deepEqual(validateEntity("upiIds", ""), { ok: false, reason: "empty" });
  });
});

describe("checkAccountCollision", () => {
  it("compares the phone form of a prefixed number against the phone set", () => {
    const phones = new Set(["9876543210"]);
    assert.deepEqual(checkAccountCollision("9876543210", phones), { collides: true, reason: "phone_collision" });
    assert.deepEqual(checkAccountCollision("09876543210", phones), { collides: true, reason: "phone_collision" });
    assert.deepEqual(checkAccountCollision("919876543210", phones), { collides: true, reason: "phone_collision" });
    assert.deepEqual(checkAccountCollision("123456789012", phones), { collides: false });
  });
});

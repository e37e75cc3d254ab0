/**
 * Default standards configuration.
 *
 * Every category is enabled for every region kind. Term tables hold the
 * house wording for digital and healthcare vocabulary; branding is empty
 * because brand names are supplied per deployment.
 */

import type { StandardsConfig } from "./schema.js";

export const DEFAULT_STANDARDS_CONFIG: StandardsConfig = {
  categories: {
    state_abbreviations: { enabled: true, appliesTo: ["page_copy", "disclaimer", "unmarked"] },
    punctuation: { enabled: true, appliesTo: ["page_copy", "disclaimer", "unmarked"] },
    digital_terms: { enabled: true, appliesTo: ["page_copy", "disclaimer", "unmarked"] },
    times: { enabled: true, appliesTo: ["page_copy", "disclaimer", "unmarked"] },
    numbers: { enabled: true, appliesTo: ["page_copy", "disclaimer", "unmarked"] },
    healthcare_terms: { enabled: true, appliesTo: ["page_copy", "disclaimer", "unmarked"] },
    branding: { enabled: true, appliesTo: ["page_copy", "disclaimer", "unmarked"] },
    final_validation: { enabled: true, appliesTo: ["page_copy", "disclaimer", "unmarked"] },
  },

  exclusions: [],
  exclusionPatterns: [],
  protectMarkup: true,

  digitalTerms: [
    { from: "e-mail", to: "email" },
    { from: "web site", to: "website" },
    { from: "on-line", to: "online" },
    { from: "log-in", to: "log in" },
    { from: "sign-in", to: "sign in" },
    { from: "wifi", to: "Wi-Fi" },
    { from: "e-commerce", to: "ecommerce" },
    { from: "smart phone", to: "smartphone" },
  ],

  healthcareTerms: [
    { from: "healthcare", to: "health care" },
    { from: "health-care", to: "health care" },
    { from: "tele-health", to: "telehealth" },
    { from: "primary care physician", to: "primary care provider" },
    { from: "well visit", to: "wellness visit" },
  ],

  branding: {
    terms: [],
    trademarks: [],
  },

  numbers: {
    spellOutMax: 9,
    thousandsThreshold: 1000,
    yearRange: { min: 1900, max: 2099 },
    phoneDigitThreshold: 10,
  },

  customRules: [],

  targets: {
    keywords: [],
  },
};

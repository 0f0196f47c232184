/**
 * Normalization: unit tests
 *
 * Ingredient names, titles and combo keys must collapse surface variation
 * (case, accents, plurals, quantities) before anything is compared.
 */

import {
  comboKeyOf,
  foldCase,
  historyKey,
  normalizeIngredient,
  normalizeIngredientSet,
  normalizeTag,
  singularize,
  techniqueLabels,
  titleTokens,
} from "../normalize";

describe("foldCase", () => {
  it("lowercases and strips accents", () => {
    expect(foldCase("Sauté")).toBe("saute");
    expect(foldCase("JALAPEÑO")).toBe("jalapeno");
  });
});

describe("singularize", () => {
  it.each([
    ["tomatoes", "tomato"],
    ["berries", "berry"],
    ["peaches", "peach"],
    ["onions", "onion"],
    ["eggs", "egg"],
    ["peas", "pea"],
    ["leaves", "leaf"],
  ])("%s → %s", (plural, singular) => {
    expect(singularize(plural)).toBe(singular);
  });

  it("leaves invariant words and short words alone", () => {
    expect(singularize("asparagus")).toBe("asparagus");
    expect(singularize("hummus")).toBe("hummus");
    expect(singularize("gas")).toBe("gas");
  });
});

describe("normalizeIngredient", () => {
  it("drops quantities, parentheticals and punctuation", () => {
    expect(normalizeIngredient("2 Cherry Tomatoes (halved)")).toBe("cherry tomato");
    expect(normalizeIngredient("Extra-virgin olive oil")).toBe("extra virgin olive oil");
  });

  it("returns an empty string when nothing is left", () => {
    expect(normalizeIngredient("  (optional) ")).toBe("");
  });
});

describe("normalizeIngredientSet", () => {
  it("sorts, de-duplicates and drops blanks", () => {
    expect(normalizeIngredientSet(["Spinach", "Eggs", "egg", " "])).toEqual(["egg", "spinach"]);
  });
});

describe("comboKeyOf", () => {
  it("is independent of order, case and plurals", () => {
    const a = comboKeyOf(["Spinach", "eggs", "Cheddar Cheese"]);
    const b = comboKeyOf(["cheddar cheese", "Egg", "spinach"]);
    expect(a).toBe("cheddar cheese+egg+spinach");
    expect(b).toBe(a);
  });

  it("scopes history keys by user", () => {
    expect(historyKey("user_1", "egg+spinach")).toBe("user_1::egg+spinach");
  });
});

describe("titleTokens", () => {
  it("splits hyphenated words and removes filler", () => {
    expect(titleTokens("Easy Pan-Seared Salmon with Lemon")).toEqual(["pan", "seared", "salmon", "lemon"]);
  });
});

describe("techniqueLabels", () => {
  it("reads cooking methods from the title in bucket order", () => {
    expect(techniqueLabels("Grilled Chicken Tacos")).toEqual(["grill", "wrap"]);
    expect(techniqueLabels("Pan-Seared Salmon")).toEqual(["skillet"]);
  });

  it("returns nothing for a title without a method", () => {
    expect(techniqueLabels("Spinach Omelette")).toEqual([]);
  });
});

describe("normalizeTag", () => {
  it("snake-cases free text", () => {
    expect(normalizeTag("Baby (6-8 months)")).toBe("baby_6_8_months");
    expect(normalizeTag(" Weeknight Dinner ")).toBe("weeknight_dinner");
  });
});

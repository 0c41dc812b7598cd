export const glowBoostInput = {
    "Product Name": "GlowBoost Vitamin C Serum",
    Concentration: "10% Vitamin C",
    "Skin Type": "Oily, Combination",
    "Key Ingredients": "Vitamin C, Hyaluronic Acid",
    Benefits: "Brightening, Fades dark spots",
    "How to Use": "Apply 2–3 drops in the morning before sunscreen",
    "Side Effects": "Mild tingling for sensitive skin",
    Price: "₹699",
};

export const UNCATEGORIZED = "uncategorized";

export const CATEGORY_DESCRIPTIONS: Readonly<Record<string, string>> = Object.freeze({
  "Logística": "Envíos, fulfillment, almacenamiento y tiempos de entrega.",
  "Regulaciones y Aduanas": "Requisitos de importación, documentación, fracciones arancelarias.",
  "Marketing y Publicidad": "Amazon Ads, estrategias de PPC, branding en Amazon.",
  "Ventas y Conversión": "Cómo mejorar listados, obtener más reviews, Buy Box.",
  "Finanzas y Costos": "Tarifas de Amazon, impuestos, costos ocultos, márgenes de ganancia.",
  "Estrategia de Negocio": "Modelos de venta (FBA vs FBM), expansión, nichos rentables.",
  "Legales y Compliance": "Propiedad intelectual, restricciones de productos, términos de servicio.",
  "Operaciones y Gestión de Inventario": "Stock, reabastecimiento, proveedores, gestión con Amazon.",
  "Optimización de Listados": "Keywords, títulos, bullet points, imágenes, descripciones.",
  "Customer Service y Devoluciones": "Manejo de clientes, disputas, reembolsos y reputación.",
  "Amazon FBA y FBM": "Comparación entre modelos, ventajas y desventajas.",
  "Análisis de Competencia": "Herramientas para investigar a otros vendedores.",
  "Expansión a Otros Mercados": "Cómo escalar de Amazon US a otros marketplaces.",
  "Amazon Seller Central": "Manejo de la plataforma, reports, troubleshooting.",
  "Reembolsos y Cargos Ocultos": "Cómo reclamar cobros indebidos en Amazon.",
});

export const CATEGORY_NAMES: readonly string[] = Object.freeze(
  Object.keys(CATEGORY_DESCRIPTIONS),
);

const CATEGORY_SET = new Set(CATEGORY_NAMES);

export function isTaxonomyCategory(label: string): boolean {
  return CATEGORY_SET.has(label);
}

/** The taxonomy label matching `name` case-insensitively, or the uncategorized sentinel. */
export function toTaxonomyCategory(name: string): string {
  const wanted = name.trim().toLowerCase();
  return CATEGORY_NAMES.find((category) => category.toLowerCase() === wanted) ?? UNCATEGORIZED;
}

export function describeTaxonomy(): string {
  return CATEGORY_NAMES.map((name) => `- ${name}: ${CATEGORY_DESCRIPTIONS[name]}`).join("\n");
}

/**
 * Keeps labels that belong to the taxonomy (plus the uncategorized sentinel),
 * in first-seen order without duplicates.
 */
export function validateCategories(labels: readonly unknown[]): string[] {
  const valid: string[] = [];
  for (const label of labels) {
    if (typeof label !== "string") {
      continue;
    }
    const trimmed = label.trim();
    const normalized =
      trimmed.toLowerCase() === UNCATEGORIZED ? UNCATEGORIZED : trimmed;
    if (
      (normalized === UNCATEGORIZED || CATEGORY_SET.has(normalized)) &&
      !valid.includes(normalized)
    ) {
      valid.push(normalized);
    }
  }
  return valid;
}

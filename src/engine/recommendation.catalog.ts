import { z } from 'zod';
import rawCatalog from './data/recommendationCatalog.json';

const StringList = z.array(z.string());

function categoryTable<T extends z.ZodTypeAny>(value: T) {
  return z.object({ byCategory: z.record(z.string(), value), default: value });
}

const MaintenanceScheduleSchema = z.object({
  monthly: StringList.optional(),
  seasonal: StringList.optional(),
  annually: StringList.optional(),
  every5Years: StringList.optional(),
});

const RecommendationCatalogSchema = z.object({
  implementationSteps: categoryTable(StringList),
  qualifications: categoryTable(StringList),
  taxCredits: categoryTable(StringList),
  warranty: categoryTable(z.string()),
  codeRequirements: categoryTable(z.string()),
  energyRating: categoryTable(z.string()),
  seasonalTiming: categoryTable(z.string()),
  maintenance: categoryTable(MaintenanceScheduleSchema),
  utilityPrograms: StringList,
  diyTips: StringList,
  selectionTips: StringList,
  redFlags: StringList,
  financing: z.object({ small: StringList, medium: StringList, large: StringList }),
  nextSteps: z.object({ high: StringList, standard: StringList, common: StringList }),
});

export type RecommendationCatalog = z.infer<typeof RecommendationCatalogSchema>;

/** Static presentation text, keyed by recommendation category with a default. */
export const RECOMMENDATION_CATALOG: RecommendationCatalog =
  RecommendationCatalogSchema.parse(rawCatalog);

export function lookupByCategory<T>(
  table: { byCategory: Record<string, T>; default: T },
  category: string,
): T {
  return table.byCategory[category] ?? table.default;
}

import { useMemo } from "react";
import { computeProductionViews, type ProductionViewOptions, type ProductionViews } from "@/lib/production-views";
import { getFilterOptions, type FilterOptions, type ProductionDataset } from "@/lib/production-records";
import type { FilterCriteria } from "@/lib/record-filters";

const NO_OPTIONS: FilterOptions = { years: [], months: [] };

interface ProductionViewsState {
  views: ProductionViews | null;
  filterOptions: FilterOptions;
  loading: boolean;
  noData: boolean;
}

/**
 * Views for the dashboard tabs, recomputed whenever the dataset, the criteria
 * or the options object change identity. Pass stable (memoized) options.
 */
export function useProductionViews(
  dataset: ProductionDataset | null | undefined,
  criteria: FilterCriteria,
  options?: ProductionViewOptions,
): ProductionViewsState {
  const filterOptions = useMemo(() => (dataset ? getFilterOptions(dataset) : NO_OPTIONS), [dataset]);

  const views = useMemo(
    () => (dataset ? computeProductionViews(dataset, criteria, options) : null),
    [dataset, criteria, options],
  );

  return {
    views,
    filterOptions,
    loading: !dataset,
    noData: views?.status === "no_data",
  };
}

import type { LoadRunStore } from "../db/load_runs";
import type { AgencyInfo } from "../export/schedule_rows";
import type { CityRegistry } from "../registry";

type dependency = {
    registry: CityRegistry;
    runs: LoadRunStore;
    resolveAgency: (cityCode: string) => AgencyInfo;
    adminToken: string;
    checkDb: () => Promise<void>;
};

export type { dependency };

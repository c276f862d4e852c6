export type Config = {
    telegram: {
        token: string;
    };
    supabase: {
        url: string;
        serviceKey: string;
    };
    reminders: {
        enabled: boolean;
        leadMinutes: number;
        intervalMs: number;
    };
};

export type ConfigEnv = Record<string, string | undefined>;

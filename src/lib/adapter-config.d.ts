// This file extends the AdapterConfig type from "@iobroker/types"

// Augment the globally declared type ioBroker.AdapterConfig
declare global {
    namespace ioBroker {
        interface AdapterConfig {
            host: string;
            mode: 'push' | 'poll';
            pollInterval: number;
            pushPort: number;
            callbackHost: string;
            schedulePush: string; // 'No', '12 AM' ... '11 PM'
            debugOutput: boolean;
            apiDebugOutput: boolean;
            playlist: string;
            random: '' | 'true' | 'false';
            repeat: '' | 'true' | 'false';
        }
    }
}

// this is required so the above AdapterConfig is found by TypeScript / type checking
export {};

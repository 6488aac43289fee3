import type { CadenceTx } from "../../schema.js";

export type Migration = {
    name: string;
    up: (tx: CadenceTx) => Promise<void>;
};

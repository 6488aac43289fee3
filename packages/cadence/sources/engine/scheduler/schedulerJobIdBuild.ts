import { createId } from "@paralleldrive/cuid2";

/** Timer job ids are unique per registration: `task_<taskId>_<cuid2>`. */
export function schedulerJobIdBuild(taskId: string): string {
    return `task_${taskId}_${createId()}`;
}

import type { Task } from "@intentflow/shared";
import type { TaskFilter } from "./interface.js";

/** Newest first, then status filter, then offset/limit. */
export function applyTaskFilter(tasks: Task[], filter?: TaskFilter): Task[] {
  let filtered = [...tasks];
  if (filter?.status) {
    const statuses = Array.isArray(filter.status)
      ? filter.status
      : [filter.status];
    filtered = filtered.filter((t) => statuses.includes(t.status));
  }

  filtered.sort((a, b) => {
    const diff =
      new Date(b.createdAt).getTime() - new Date(a.createdAt).getTime();
    return diff !== 0 ? diff : a.id.localeCompare(b.id);
  });

  if (filter?.offset) {
    filtered = filtered.slice(filter.offset);
  }
  if (filter?.limit) {
    filtered = filtered.slice(0, filter.limit);
  }
  return filtered;
}

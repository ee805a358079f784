import { Command } from "commander";
import { openConfigStore, type GlobalOptions } from "../lib/command-context";
import { renderTable } from "../lib/table";
import type { WorkloadTable } from "../lib/types";
import { workloadNames } from "../lib/workloads";

export function registerWorkloadsCommand(program: Command): void {
  program
    .command("workloads")
    .description("List the workloads the instance can run")
    .action(async (_options: unknown, command: Command) => {
      const store = await openConfigStore(command.optsWithGlobals<GlobalOptions>());
      console.log(renderWorkloadTable(store.get().workloads));
    });
}

export function renderWorkloadTable(workloads: WorkloadTable): string {
  const rows = workloadNames(workloads).map((name) => {
    const workload = workloads[name];
    return [name, String(workload.port), workload.description ?? "-"];
  });
  return renderTable(["NAME", "PORT", "DESCRIPTION"], rows, {
    align: ["left", "right", "left"],
    emptyText: "No workloads configured."
  });
}

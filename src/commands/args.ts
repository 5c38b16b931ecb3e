export const topologyArgs = {
  file: {
    type: "string",
    alias: "c",
    description: "Topology file. Defaults to vmtopo.yaml in this or a parent directory.",
  },
} as const;

export const machineArgs = {
  machines: {
    type: "positional",
    required: false,
    description: "Machines to target (default: all machines in the topology)",
  },
  ...topologyArgs,
} as const;

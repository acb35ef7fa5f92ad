export interface ModelCapabilityMemo {
  supportsSystemRole(model: string): boolean;
  markNoSystemRole(model: string): void;
  noSystemModels(): string[];
}

export const createModelCapabilityMemo = (): ModelCapabilityMemo => {
  const noSystem = new Set<string>();
  return {
    supportsSystemRole: (model) => !noSystem.has(model),
    markNoSystemRole: (model) => {
      noSystem.add(model);
    },
    noSystemModels: () => [...noSystem],
  };
};

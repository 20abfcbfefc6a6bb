export type StartCodeProvider = {
  startCode: () => Promise<string>;
};

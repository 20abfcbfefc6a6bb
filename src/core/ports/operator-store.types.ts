export type OperatorRecord = {
  chatId: string;
  username?: string;
  pairedAt: string;
};

export type OperatorStore = {
  get: () => Promise<OperatorRecord | undefined>;
  remember: (input: { chatId: string; username?: string }) => Promise<void>;
  forget: () => Promise<void>;
};

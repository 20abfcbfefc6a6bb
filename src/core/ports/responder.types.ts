export type Responder = {
  /** Sends `text` to the human at `destination`; false means it was not delivered. */
  deliver: (destination: string, text: string, signal?: AbortSignal) => Promise<boolean>;
};

export type DestinationResolver = () => Promise<string | undefined>;

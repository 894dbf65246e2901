export type Network = {
  name: string;
  pubKeyHash: number;
  wif: number;
};

export const Networks = {
  Mainnet: {
    name: "mainnet",
    pubKeyHash: 0x00,
    wif: 0x80,
  },
  Testnet: {
    name: "testnet",
    pubKeyHash: 0x6f,
    wif: 0xef,
  },
} satisfies { [name: string]: Network };

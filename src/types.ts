export type AccountId = string

export type AssetId = string

export type PairId = string

export type Quantity = bigint

export type Price = bigint

export enum OrderSide {
  Ask = 0,
  Bid = 1,
}

export interface Offer {
  readonly beneficiary: AccountId;
  readonly quantity: Quantity;
  readonly sequence: number;
}

export interface PairAssets {
  base: AssetId;   // asset A, escrowed by bids
  quote: AssetId;  // asset B, escrowed by asks
}

export interface OrderRequest {
  price: Price;
  quantity: Quantity;
  beneficiary: AccountId;
  payer?: AccountId;
}

export interface Fill {
  pairId: PairId;
  price: Price;
  bidBeneficiary: AccountId;
  askBeneficiary: AccountId;
  baseAmount: Quantity;
  quoteAmount: Quantity;
  dust: Quantity;
}

export interface RestingOffer {
  price: Price;
  offer: Offer;
}

export interface DepthLevel {
  price: Price;
  quantity: Quantity;
  offers: number;
}

import { Column, Entity, PrimaryColumn } from 'typeorm';

@Entity('SecurityTokens')
export class SecurityToken {
  @PrimaryColumn({ name: 'token_symbol' })
  tokenSymbol!: string;

  @Column({ name: 'token_name' })
  tokenName!: string;

  @Column('text', { name: 'token_status', nullable: true })
  tokenStatus!: string | null;

  @Column('text', { nullable: true })
  industry!: string | null;

  @Column('text', { name: 'amount_raised', nullable: true })
  amountRaised!: string | null;

  @Column('text', { nullable: true })
  currency!: string | null;

  @Column('text', { name: 'issuance_price', nullable: true })
  issuancePrice!: string | null;

  @Column('text', { name: 'min_invest', nullable: true })
  minInvest!: string | null;

  @Column('text', { name: 'closing_date', nullable: true })
  closingDate!: string | null;

  @Column('text', { name: 'target_investor_type', nullable: true })
  targetInvestorType!: string | null;

  @Column('text', { name: 'jurisdictions_avail', nullable: true })
  jurisdictionsAvail!: string | null;

  @Column('text', { name: 'restricted_area', nullable: true })
  restrictedArea!: string | null;

  @Column('text', { name: 'secondary_market', nullable: true })
  secondaryMarket!: string | null;

  @Column('text', { nullable: true })
  website!: string | null;

  @Column('text', { nullable: true })
  whitepaper!: string | null;

  @Column('text', { nullable: true })
  prospectus!: string | null;

  @Column('text', { name: 'smart_contract', nullable: true })
  smartContract!: string | null;

  @Column('text', { nullable: true })
  github!: string | null;

  @Column('text', { nullable: true })
  blockchain!: string | null;

  @Column('text', { name: 'issuer_address', nullable: true })
  issuerAddress!: string | null;

  @Column('text', { name: 'token_used', nullable: true })
  tokenUsed!: string | null;

  @Column('text', { nullable: true })
  dividend!: string | null;

  @Column('text', { nullable: true })
  voting!: string | null;

  @Column('text', { name: 'equity_ownership', nullable: true })
  equityOwnership!: string | null;

  @Column('text', { name: 'mme_class', nullable: true })
  mmeClass!: string | null;

  @Column('text', { nullable: true })
  interest!: string | null;

  @Column('text', { nullable: true })
  portfolio!: string | null;
}

export type SecurityTokenSymbol = Pick<SecurityToken, 'tokenName' | 'tokenSymbol'>;

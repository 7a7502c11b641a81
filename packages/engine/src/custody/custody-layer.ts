/**
 * Custody Layer
 *
 * The only component that talks to the value-moving collaborators. It
 * builds interactions for the engine to queue and settles them once the
 * ledger phase of an operation has committed its checks.
 */

import {
	AccountId,
	AssetId,
	EngineError,
	EngineLogger,
	toError,
} from "../core/types.js";
import { AssetRegistry } from "../registry/asset-registry.js";
import { Interaction, LiabilityToken } from "./types.js";

export class CustodyLayer {
	constructor(
		private readonly registry: AssetRegistry,
		private readonly liabilityToken: LiabilityToken,
		readonly custodyAccount: AccountId,
		private readonly logger: EngineLogger,
	) {}

	/**
	 * Pull collateral from an account into custody. Compensated by sending
	 * it back.
	 */
	pullCollateral(from: AccountId, asset: AssetId, amount: bigint): Interaction {
		const { token } = this.registry.get(asset);
		return {
			description: `pull ${amount} ${asset} from ${from}`,
			execute: () => token.transferFrom(from, this.custodyAccount, amount),
			compensate: () => token.transfer(from, amount),
		};
	}

	/**
	 * Push collateral out of custody. Not compensable, so it must be the
	 * last interaction of a unit.
	 */
	pushCollateral(to: AccountId, asset: AssetId, amount: bigint): Interaction {
		const { token } = this.registry.get(asset);
		return {
			description: `push ${amount} ${asset} to ${to}`,
			execute: () => token.transfer(to, amount),
		};
	}

	mintLiability(to: AccountId, amount: bigint): Interaction {
		return {
			description: `mint ${amount} liability to ${to}`,
			execute: () => this.liabilityToken.mint(to, amount),
			compensate: () => this.liabilityToken.burn(to, amount),
		};
	}

	burnLiability(from: AccountId, amount: bigint): Interaction {
		return {
			description: `burn ${amount} liability from ${from}`,
			execute: () => this.liabilityToken.burn(from, amount),
			compensate: () => this.liabilityToken.mint(from, amount),
		};
	}

	/**
	 * Execute interactions in order.
	 *
	 * On the first failure, interactions that already ran are compensated
	 * in reverse order and TRANSFER_FAILED is thrown.
	 *
	 * @throws EngineError TRANSFER_FAILED
	 */
	settle(interactions: Interaction[]): void {
		const done: Interaction[] = [];
		for (const interaction of interactions) {
			let ok = false;
			let cause: unknown = undefined;
			try {
				ok = interaction.execute();
			} catch (err) {
				cause = err;
			}

			if (!ok) {
				const uncompensated = this.compensate(done);
				throw new EngineError(
					`Transfer failed: ${interaction.description}`,
					"TRANSFER_FAILED",
					{
						interaction: interaction.description,
						...(uncompensated.length > 0 ? { uncompensated } : {}),
					},
					{ cause },
				);
			}
			done.push(interaction);
		}
	}

	/**
	 * @returns Descriptions of the interactions that could not be undone
	 */
	private compensate(done: Interaction[]): string[] {
		const uncompensated: string[] = [];
		for (const interaction of [...done].reverse()) {
			if (!interaction.compensate) {
				this.logger.error(
					`Cannot compensate "${interaction.description}": no compensation defined`,
				);
				uncompensated.push(interaction.description);
				continue;
			}
			try {
				if (!interaction.compensate()) {
					this.logger.error(
						`Compensation of "${interaction.description}" was rejected`,
					);
					uncompensated.push(interaction.description);
				}
			} catch (err) {
				this.logger.error(
					`Compensation of "${interaction.description}" threw: ${toError(err).message}`,
				);
				uncompensated.push(interaction.description);
			}
		}
		return uncompensated;
	}
}

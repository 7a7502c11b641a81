import { Global, Module } from "@nestjs/common";
import { ConfigService } from "@nestjs/config";
import {
	DEBT_ENGINE,
	ENGINE_COLLABORATORS,
	ENGINE_SETTINGS,
} from "./engine.constants";
import { EngineSettings, readEngineSettings } from "./engine-settings";
import {
	createCollaborators,
	createDebtEngine,
	EngineCollaborators,
} from "./engine.factory";
import { EngineEventsBridge } from "./engine-events.bridge";

/**
 * Hosts the process-wide debt engine and its in-memory collaborators.
 */
@Global()
@Module({
	providers: [
		{
			provide: ENGINE_SETTINGS,
			inject: [ConfigService],
			useFactory: (config: ConfigService) => readEngineSettings(config),
		},
		{
			provide: ENGINE_COLLABORATORS,
			inject: [ENGINE_SETTINGS],
			useFactory: (settings: EngineSettings) => createCollaborators(settings),
		},
		{
			provide: DEBT_ENGINE,
			inject: [ENGINE_SETTINGS, ENGINE_COLLABORATORS],
			useFactory: (
				settings: EngineSettings,
				collaborators: EngineCollaborators,
			) => createDebtEngine(settings, collaborators),
		},
		EngineEventsBridge,
	],
	exports: [DEBT_ENGINE, ENGINE_COLLABORATORS, ENGINE_SETTINGS],
})
export class EngineModule {}

import { BadRequestException, Injectable, PipeTransform } from "@nestjs/common";
import { ACCOUNT_PATTERN } from "../account";

@Injectable()
export class ParseAccountPipe implements PipeTransform<string, string> {
	transform(value: string): string {
		if (!ACCOUNT_PATTERN.test(value)) {
			throw new BadRequestException("Invalid account");
		}
		return value;
	}
}

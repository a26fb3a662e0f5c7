import { BadRequestException, Injectable, PipeTransform } from "@nestjs/common";
import { Cursor, cursorFromString, emptyCursor } from "../dto/envelopes";

/** Decodes the `cursor` query parameter of paginated lists. */
@Injectable()
export class ParseCursorPipe
	implements PipeTransform<string | undefined, Cursor>
{
	transform(value: string | undefined): Cursor {
		if (value === undefined || value === "") {
			return emptyCursor;
		}
		const cursor = cursorFromString(value);
		if (cursor.createdBefore === undefined || cursor.idBefore === undefined) {
			throw new BadRequestException(`Invalid cursor '${value}'`);
		}
		return cursor;
	}
}

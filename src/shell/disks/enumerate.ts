// CHANGE: Disk enumeration through PowerShell Get-Disk
// WHY: Operators pick the disk number from this listing; it is advisory and never validates the choice
// PURITY: SHELL
// EFFECT: Effect<readonly DiskInfo[], ExecError>
// COMPLEXITY: O(n) where n = number of disks

import { Effect } from "effect";

import { decodeDiskList } from "../../core/disks.js";
import { ExecError } from "../../core/errors.js";
import type { DiskInfo } from "../../core/models.js";
import { execCommand } from "../utils/exec.js";

// BusType is cast to string so ConvertTo-Json emits "USB" rather than the enum value.
const GET_DISK_SCRIPT =
	"Get-Disk | Select-Object Number,FriendlyName,Size,@{Name='BusType';Expression={[string]$_.BusType}} | ConvertTo-Json -Compress";

/**
 * Full command line used for enumeration.
 *
 * @pure true
 */
export const diskListCommand = (powershell: string): string =>
	`${powershell} -NoProfile -NonInteractive -Command "${GET_DISK_SCRIPT}"`;

/**
 * Lists disks on the host.
 *
 * @param powershell - PowerShell executable
 *
 * @pure false (spawns PowerShell)
 * @effect Effect<readonly DiskInfo[], ExecError>
 */
export function listDisks(
	powershell: string,
): Effect.Effect<readonly DiskInfo[], ExecError> {
	const command = diskListCommand(powershell);
	return execCommand(command, { timeout: 30_000 }).pipe(
		Effect.flatMap((stdout) => {
			const disks = decodeDiskList(stdout);
			return disks === null
				? Effect.fail(
						new ExecError({ command, detail: "unexpected Get-Disk output" }),
					)
				: Effect.succeed(disks);
		}),
	);
}

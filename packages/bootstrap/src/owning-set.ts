/**
 * Lists the instance names of one scale set.
 * Resolves to null when the set disappeared after it was listed.
 */
export type InstanceLister = (scaleSetName: string) => Promise<readonly string[] | null>;

/**
 * Second stage of owning-set resolution: scan the listed sets in order and
 * return the first whose instances include instanceId, or null.
 *
 * The two listings are not atomic; a set that vanished in between is a miss.
 */
export async function findOwningSet(
	instanceId: string,
	scaleSetNames: readonly string[],
	listInstances: InstanceLister,
): Promise<string | null> {
	for (const name of scaleSetNames) {
		const instances = await listInstances(name);
		if (instances !== null && instances.includes(instanceId)) {
			return name;
		}
	}
	return null;
}

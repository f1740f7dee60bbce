// Types for package structure and locate results
type Manifest = ReadonlyMap<string, string>; // item id -> href, relative to the package descriptor

type Spine = readonly string[];

type SpineXmlPosition = {
	ordinal: number; // 1-based, -1 when the package has no spine
	total: number;
};

type PackageDescriptor = {
	manifest: Manifest;
	spine: Spine;
	spineXmlPosition: SpineXmlPosition;
};

type ElementStep = {
	tagName: string;
	siblingOrdinal: number;
};

type StructuralAddress = {
	spineIndex: number;
	spineTotal: number;
	matchedFile: string;
	elementPath: ElementStep[];
	indexPath: number[];
	matchStart: number;
	matchEnd: number;
	nodeText: string;
};

type PublicationLayout = {
	packagePath: string;
	spineXmlPosition: SpineXmlPosition;
	spineDocuments: string[];
};

type LocateResult =
	| { status: "found"; address: StructuralAddress; publication: PublicationLayout }
	| { status: "not-found"; publication: PublicationLayout };

type LocateOptions = {
	tempDir?: string; // parent directory for the staging area
	verbose?: boolean;
};

export type {
	ElementStep,
	LocateOptions,
	LocateResult,
	Manifest,
	PackageDescriptor,
	PublicationLayout,
	Spine,
	SpineXmlPosition,
	StructuralAddress,
};

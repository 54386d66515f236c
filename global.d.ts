// Global type declarations for the booru-curator project

// Common file/path types
type ImagePath = string;
type PathList = ReadonlyArray<ImagePath>;

// Progress bar options
type BarOptions = {
	task?: string;
	color?: (text: string) => string;
};

/** Distro identity for repository management; one variant per supported family member. */
export type DistroRepository =
  | { readonly kind: "kali" }
  | { readonly kind: "debian"; readonly codename: string }
  | { readonly kind: "ubuntu"; readonly codename: string };

export type DistroKind = DistroRepository["kind"];

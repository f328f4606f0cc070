export enum EOutputFormat {
    groovy = "groovy",
    json = "json"
}
